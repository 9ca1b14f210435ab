export type LogFn = (message: string) => void;

let sink: LogFn = (message: string) => console.log(message);

export const setLogger = (logger: LogFn) => {
    sink = logger;
};

export const resetLogger = () => {
    sink = (message: string) => console.log(message);
};

/**
 * Returns a log function that prefixes every line with `[TAG]`.
 * The sink is looked up per call so `setLogger` applies to loggers created earlier.
 */
export const createLog = (tag: string): LogFn => {
    return (message: string) => sink(`[${tag}] ${message}`);
};
