import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Spinner shown on stderr while manifests load
 */
export class Spinner {
    private spinner: Ora;

    constructor(visible = true) {
        this.spinner = ora({
            color: 'cyan',
            spinner: 'dots',
            isSilent: !visible,
        });
    }

    start(message: string): void {
        this.spinner.start(chalk.dim(`  ${message}`));
    }

    success(message: string): void {
        this.spinner.succeed(chalk.green(`  ${message}`));
    }

    fail(message: string): void {
        this.spinner.fail(chalk.red(`  ${message}`));
    }
}
