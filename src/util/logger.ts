import pino from 'pino';
import env from './env';

import { getRunId } from './context';

const pinoLogger = pino({
    level: env.LOG_LEVEL,
    transport: {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    }
});

type LogFn = (msg: string | object, ...args: unknown[]) => void;

const LOG_METHODS = new Set(['info', 'warn', 'error', 'debug', 'trace', 'fatal']);

function wrapLogMethod(method: LogFn): LogFn {
    return (msg: string | object, ...args: unknown[]) => {
        const runId = getRunId();
        if (!runId) {
            method(msg, ...args);
        } else if (typeof msg === 'string') {
            method(`[${runId}] ${msg}`, ...args);
        } else {
            method({ ...msg, runId }, ...args);
        }
    };
}

const logger = new Proxy(pinoLogger, {
    get(target, prop, receiver) {
        const value: unknown = Reflect.get(target, prop, receiver);
        if (typeof value === 'function' && typeof prop === 'string' && LOG_METHODS.has(prop)) {
            return wrapLogMethod(value.bind(target));
        }
        return value;
    }
});

export default logger;
