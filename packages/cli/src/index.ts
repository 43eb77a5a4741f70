#!/usr/bin/env node
/**
 * payee-match CLI
 *
 * All file I/O happens here; the core gets loaded data and returns
 * outcomes, changes and warnings.
 */

import { parseArgs } from 'node:util';
import { categorize } from './commands/categorize.js';
import { suggest } from './commands/suggest.js';
import { check } from './commands/check.js';
import { addPattern } from './commands/add-pattern.js';
import { assign } from './commands/assign.js';
import { errorMessage } from './utils/errors.js';
import { VERSION } from './version.js';

const USAGE = `payee-match v${VERSION}

Usage:
  payee-match categorize <activity.csv> [--dry-run] [--yes]
  payee-match suggest <text> [--limit <n>]
  payee-match check
  payee-match add-pattern <regex> <payee> <category> [--flags <imsx>]
  payee-match assign <merchant> <category> [--group <group>]

Options:
  --workspace <dir>   Workspace root (default: nearest parent with data/rules.json)
  -h, --help          Show this help
`;

function usageError(message: string): never {
    console.error(`\n✖ Error: ${message}\n`);
    console.error(USAGE);
    process.exit(1);
}

async function main(): Promise<void> {
    const { values, positionals } = parseArgs({
        args: process.argv.slice(2),
        allowPositionals: true,
        options: {
            workspace: { type: 'string' },
            'dry-run': { type: 'boolean', default: false },
            yes: { type: 'boolean', short: 'y', default: false },
            limit: { type: 'string' },
            flags: { type: 'string' },
            group: { type: 'string' },
            help: { type: 'boolean', short: 'h', default: false },
        },
    });

    const [command, ...args] = positionals;
    if (!command || values.help) {
        console.log(USAGE);
        return;
    }

    const workspace = values.workspace;

    switch (command) {
        case 'categorize': {
            if (args.length !== 1) usageError('categorize takes one activity file');
            await categorize(args[0], { dryRun: values['dry-run'] === true, yes: values.yes === true, workspace });
            return;
        }
        case 'suggest': {
            let limit: number | undefined;
            if (values.limit !== undefined) {
                limit = Number(values.limit);
                if (!Number.isInteger(limit) || limit < 1) usageError(`Invalid limit "${values.limit}"`);
            }
            await suggest(args.join(' '), { limit, workspace });
            return;
        }
        case 'check':
            await check({ workspace });
            return;
        case 'add-pattern': {
            if (args.length !== 3) usageError('add-pattern takes <regex> <payee> <category>');
            await addPattern(args[0], args[1], args[2], { flags: values.flags, workspace });
            return;
        }
        case 'assign': {
            if (args.length !== 2) usageError('assign takes <merchant> <category>');
            await assign(args[0], args[1], { group: values.group, workspace });
            return;
        }
        default:
            usageError(`Unknown command "${command}"`);
    }
}

main().catch((err: unknown) => {
    console.error(`\n✖ Error: ${errorMessage(err)}`);
    process.exit(1);
});
