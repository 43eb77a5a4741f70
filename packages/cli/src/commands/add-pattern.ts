import { addPatternRule, checkPatternCollision, validatePattern, type RuleStore } from '@payee-match/core';
import { loadRuleStore } from '../workspace/config.js';
import { saveRuleStore } from '../store/persist.js';
import { success, log, arrow, warn } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import { requireWorkspace } from './workspace.js';
import type { AddPatternOptions } from '../types.js';

/**
 * Append a regex rule. Pattern rules are evaluated before exact rules,
 * in file order, so a new pattern only wins where no earlier one matches.
 */
export async function addPattern(
    pattern: string,
    payee: string,
    category: string,
    options: AddPatternOptions
): Promise<void> {
    const workspace = requireWorkspace(options.workspace);

    let store: RuleStore;
    try {
        store = loadRuleStore(workspace);
    } catch (err) {
        console.error(`\n✖ Error: ${errorMessage(err)}`);
        process.exit(1);
    }

    if (!payee.trim() || !category.trim()) {
        console.error('\n✖ Error: Payee and category must not be empty.');
        process.exit(1);
    }

    const flags = options.flags;
    if (flags !== undefined && !/^[imsx]*$/.test(flags)) {
        console.error(`\n✖ Error: Invalid flags "${flags}". Use any of i, m, s, x.`);
        process.exit(1);
    }

    const knownMerchants = [...store.exact.values()].map((e) => e.merchant);
    const validation = validatePattern(pattern, flags, knownMerchants);
    if (!validation.valid) {
        console.error(`\n✖ Error: ${validation.errors.join(', ')}`);
        process.exit(1);
    }
    for (const w of validation.warnings) {
        warn(w);
    }

    const collision = checkPatternCollision(pattern, flags, store);
    if (collision.hasCollision) {
        warn('Pattern collision detected.');
        log(`  Your pattern "${pattern}" duplicates an existing rule:`);
        log(`  "${collision.collidingPatterns[0]}"`);
        log('  The earlier rule wins; adding anyway.\n');
    }

    const { changes } = addPatternRule(store, {
        pattern,
        ...(flags !== undefined ? { flags } : {}),
        normalized: payee.trim(),
        category: category.trim(),
    });

    try {
        await saveRuleStore(workspace, store);
    } catch (err) {
        console.error(`\n✖ Failed to save rules: ${errorMessage(err)}`);
        process.exit(1);
    }

    success('Pattern rule added!');
    arrow(`Pattern:  /${pattern}/${flags ?? 'i'}`);
    arrow(`Payee:    ${payee.trim()}`);
    arrow(`Category: ${category.trim()}`);
    for (const change of changes) {
        if (change.type === 'category-added') {
            arrow(`New category: ${change.category}`);
            if (change.needs_group) {
                warn(`Category "${change.category}" is not assigned to a group`);
            }
        }
    }
}
