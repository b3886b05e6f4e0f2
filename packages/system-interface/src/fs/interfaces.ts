export interface FileSystem {
    /**
     * Reads the entire contents of a file as a string.
     * @param path The path to the file.
     */
    readFileAsString(path: string): Promise<string>;

    /**
     * Writes a string to a file, overwriting the file if it already exists.
     * @param path The path to the file.
     * @param content The string content to write.
     */
    writeStringToFile(path: string, content: string): Promise<void>;

    /**
     * Checks if the given path exists (file or directory). Symbolic links
     * are followed, so a dangling link does not exist.
     * @param path The path to check.
     */
    pathExists(path: string): Promise<boolean>;

    /**
     * Creates a new directory.
     * @param path The path of the directory to create.
     * @param options Options, typically including a recursive flag.
     */
    createDirectory(
        path: string,
        options?: { recursive?: boolean },
    ): Promise<void>;

    /**
     * Reads the contents of a directory.
     * @param path The path to the directory.
     * @returns A promise that resolves with an array of file/directory names in the directory.
     */
    readDirectory(path: string): Promise<string[]>;

    // --- Deletion and Links ---

    /**
     * Removes a file, a symbolic link or a directory.
     * @param path The path to the file or directory to remove.
     * @param options Options, typically including a recursive flag for directories.
     */
    remove(path: string, options?: { recursive?: boolean }): Promise<void>;

    /**
     * Creates a symbolic link at `path` pointing to `target`. The target
     * does not have to exist.
     */
    createSymbolicLink(target: string, path: string): Promise<void>;

    // --- Type Checking ---

    /**
     * Checks if the given path is a directory, following symbolic links.
     * Rejects when nothing is at the path.
     * @param path The path to check.
     */
    isDirectory(path: string): Promise<boolean>;

    /**
     * Checks if the given path is itself a symbolic link, whether or not
     * the link resolves. Returns false when nothing is at the path.
     * @param path The path to check.
     */
    isSymbolicLink(path: string): Promise<boolean>;
}
