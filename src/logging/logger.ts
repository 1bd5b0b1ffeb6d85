import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

const LEVEL_STYLE: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
    debug: chalk.dim,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red,
};

export type LogSink = (line: string) => void;

/**
 * Logger — leveled, timestamped lines on stderr
 *
 * stdout is left to command output (chains, plans, JSON), so piping a
 * command never picks up log noise.
 */
export class Logger {
    constructor(
        private level: LogLevel = 'info',
        private sink: LogSink = line => console.error(line),
        private scope?: string
    ) {}

    /**
     * Logger that drops everything
     */
    static silent(): Logger {
        return new Logger('silent');
    }

    /**
     * Derive a logger whose lines are tagged with a scope
     */
    child(scope: string): Logger {
        return new Logger(this.level, this.sink, this.scope ? `${this.scope}:${scope}` : scope);
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
    }

    debug(message: string): void {
        this.write('debug', message);
    }

    info(message: string): void {
        this.write('info', message);
    }

    warn(message: string): void {
        this.write('warn', message);
    }

    error(message: string): void {
        this.write('error', message);
    }

    private write(level: Exclude<LogLevel, 'silent'>, message: string): void {
        if (!this.isEnabled(level)) return;

        const timestamp = new Date().toISOString().slice(11, 19);
        const scope = this.scope ? chalk.dim(`[${this.scope}] `) : '';
        this.sink(`${chalk.dim(timestamp)} ${LEVEL_STYLE[level](level.padEnd(5))} ${scope}${message}`);
    }
}
