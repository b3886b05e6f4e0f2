import { formatCommandLine } from "@l2d/system-interface";

export class PdalCommandError extends Error {
    constructor(
        public readonly command: string,
        public readonly args: readonly string[],
        public readonly exitCode: number,
    ) {
        super(
            `${formatCommandLine(command, args)} exited with code ${exitCode}`,
        );
        super.name = this.constructor.name;
    }
}

export class PdalOperationError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        super.name = this.constructor.name;
    }
}

export class InvalidOptionsError extends Error {
    constructor(
        public readonly operation: string,
        message: string,
    ) {
        super(`Invalid options for ${operation}: ${message}`);
        super.name = this.constructor.name;
    }
}
