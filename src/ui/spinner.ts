/**
 * @file Terminal Spinner
 *
 * @module ui/spinner
 */

import chalk from 'chalk';

const SPINNER_FRAMES: readonly string[] = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

const HIDE_CURSOR: string = '\x1b[?25l';
const SHOW_CURSOR: string = '\x1b[?25h';

export interface SpinnerTarget {
    write(chunk: string): boolean;
}

/**
 * Starts a spinner on the current line.
 * Returns a stop function that clears the spinner.
 */
export function spinner_start(label: string = 'Loading', target: SpinnerTarget = process.stdout): () => void {
    let frameIdx: number = 0;
    target.write(HIDE_CURSOR);

    const timer: NodeJS.Timeout = setInterval((): void => {
        const frame: string = SPINNER_FRAMES[frameIdx % SPINNER_FRAMES.length];
        target.write(`\r${chalk.cyan(frame)} ${chalk.gray(`${label}...`)}  `);
        frameIdx++;
    }, 80);

    return (): void => {
        clearInterval(timer);
        target.write(`\r${' '.repeat(label.length + 10)}\r`);
        target.write(SHOW_CURSOR);
    };
}
