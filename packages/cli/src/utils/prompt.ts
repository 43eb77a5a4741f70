import { createInterface } from 'node:readline';

/**
 * Ask for a yes/no confirmation on the terminal.
 * `--yes` answers for the user; without a TTY the answer is no.
 */
export async function promptContinue(message: string, options: { yes: boolean }): Promise<boolean> {
    if (options.yes) return true;

    if (!process.stdin.isTTY) {
        console.error('Non-interactive mode. Use --yes to confirm rule changes.');
        return false;
    }

    const rl = createInterface({ input: process.stdin, output: process.stdout });

    return new Promise((resolve) => {
        rl.question(`${message} [y/N] `, (answer) => {
            rl.close();
            resolve(answer.trim().toLowerCase() === 'y');
        });
    });
}
