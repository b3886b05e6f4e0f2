export function promisifyNoErr<TArgs extends unknown[], TResult>(
    fn: (...args: [...TArgs, (res: TResult) => void]) => void,
) {
    return (...args: TArgs): Promise<TResult> => {
        return new Promise((resolve) => {
            fn(...args, (result) => {
                return resolve(result);
            });
        });
    };
}

export function isNotFoundError(e: unknown): boolean {
    return (
        typeof e === "object" &&
        e !== null &&
        "code" in e &&
        (e.code === "ENOENT" || e.code === "ENOTDIR")
    );
}
