export type LogFields = Record<string, unknown>;

export interface Logger {
    debug(message: string, fields?: LogFields): void;
    info(message: string, fields?: LogFields): void;
    warn(message: string, fields?: LogFields): void;
    error(message: string, fields?: LogFields): void;
}

function write(method: 'debug' | 'info' | 'warn' | 'error', message: string, fields?: LogFields): void {
    if (fields && Object.keys(fields).length > 0) {
        console[method](`[jobline] ${message}`, fields);
    } else {
        console[method](`[jobline] ${message}`);
    }
}

export const consoleLogger: Logger = {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
};

export const silentLogger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
};
