import { loggingConfigSchema, type LogLevel, type Logger, type LoggingConfig } from '@waypoint/core';
import pino, { type DestinationStream, type Logger as PinoInstance, type LoggerOptions } from 'pino';

export interface PinoLoggerOptions {
    level?: LogLevel;
    prettyPrint?: boolean;
    name?: string;
    /** Writes JSON lines here instead of stdout; pretty printing is ignored. */
    destination?: DestinationStream;
}

export class PinoLogger implements Logger {
    private readonly pino: PinoInstance;

    constructor(options: PinoLoggerOptions = {}, instance?: PinoInstance) {
        this.pino = instance ?? PinoLogger.createInstance(options);
    }

    private static createInstance(options: PinoLoggerOptions): PinoInstance {
        const { level = 'info', prettyPrint = false, name, destination } = options;

        const pinoOptions: LoggerOptions = {
            level
        };

        if (name) {
            pinoOptions.name = name;
        }

        if (destination) {
            return pino(pinoOptions, destination);
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
        }

        return pino(pinoOptions);
    }

    private write(level: LogLevel, arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino[level](arg1);
        } else {
            this.pino[level](arg1, arg2);
        }
    }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('trace', arg1, arg2);
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('debug', arg1, arg2);
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('info', arg1, arg2);
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('warn', arg1, arg2);
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('error', arg1, arg2);
    }

    public fatal(obj: Record<string, unknown>, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('fatal', arg1, arg2);
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new PinoLogger({}, this.pino.child(bindings));
    }
}

/**
 * Builds the default logger from partial logging config; unset fields fall
 * back to `LOGGING_DEFAULTS` (pretty output outside production).
 */
export function createLogger(config: Partial<LoggingConfig> & { name?: string } = {}): PinoLogger {
    const { level, prettyPrint } = loggingConfigSchema.parse({ level: config.level, prettyPrint: config.prettyPrint });
    return new PinoLogger({ level, prettyPrint, name: config.name ?? 'waypoint' });
}
