export interface Process {
    currentDir(): string;
    /**
     * Changes the working directory. Relative paths resolve against the
     * current one. Throws when the directory cannot be entered.
     */
    setCurrentDir(dir: string): void;
    args(): string[];
    env(): ProcessEnv;
    tempDir(): string;
}

export interface ProcessEnv {
    [key: string]: string | undefined;
}
