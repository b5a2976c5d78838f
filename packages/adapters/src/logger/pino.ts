import { type LogLevel, type Logger, type LoggingConfig } from '@strata/core';
import pino, { type DestinationStream, type Logger as PinoInstance } from 'pino';

export interface PinoLoggerOptions extends Partial<LoggingConfig> {
    /** Where JSON lines go. Ignored when pretty printing, which owns its transport. */
    destination?: DestinationStream;
}

type LogArgs = [obj: Record<string, unknown>, msg?: string] | [msg: string];

export class PinoLogger implements Logger {
    private readonly instance: PinoInstance;

    public constructor(options: PinoLoggerOptions | PinoInstance = {}) {
        this.instance = isPinoInstance(options) ? options : createPinoInstance(options);
    }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(...args: LogArgs): void {
        this.write('trace', args);
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(...args: LogArgs): void {
        this.write('debug', args);
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(...args: LogArgs): void {
        this.write('info', args);
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(...args: LogArgs): void {
        this.write('warn', args);
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(...args: LogArgs): void {
        this.write('error', args);
    }

    public fatal(obj: Record<string, unknown>, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(...args: LogArgs): void {
        this.write('fatal', args);
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new PinoLogger(this.instance.child(bindings));
    }

    private write(level: LogLevel, args: LogArgs): void {
        const [first, msg] = args;
        if (typeof first === 'string') {
            this.instance[level](first);
        } else {
            this.instance[level](first, msg);
        }
    }
}

function isPinoInstance(value: PinoLoggerOptions | PinoInstance): value is PinoInstance {
    return 'child' in value && typeof value.child === 'function';
}

function createPinoInstance(options: PinoLoggerOptions): PinoInstance {
    const { level = 'info', prettyPrint = false, name, destination } = options;
    const pinoOptions: pino.LoggerOptions = { level };

    if (name) {
        pinoOptions.name = name;
    }

    if (prettyPrint) {
        pinoOptions.transport = {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        };
        return pino(pinoOptions);
    }

    return destination ? pino(pinoOptions, destination) : pino(pinoOptions);
}

export function createLogger(config: Partial<LoggingConfig> = {}): Logger {
    return new PinoLogger(config);
}
