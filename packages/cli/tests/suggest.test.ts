import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { suggest, suggestCategories } from '../src/commands/suggest.js';
import { makeWorkspace, removeWorkspace, silenceConsole } from './helpers.js';

describe('suggest command', () => {
    let root: string;

    beforeEach(async () => {
        silenceConsole();
        root = await makeWorkspace({
            'data/rules.json': '{}',
            'data/categories.txt': 'Gas\nGas & Electric\nElectronics\nGroceries\n',
            'config/settings.yaml': 'aliases:\n  "Gas & Electric": [power]\n',
        });
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await removeWorkspace(root);
    });

    it('ranks workspace categories', () => {
        const results = suggestCategories('gas elec', { workspace: root });
        expect(results.map((r) => [r.item.label, r.score])).toEqual([
            ['Gas & Electric', 556],
            ['Gas', 282.5],
            ['Electronics', 198.5],
        ]);
    });

    it('honours the limit option', () => {
        const results = suggestCategories('gas elec', { limit: 1, workspace: root });
        expect(results.map((r) => r.item.label)).toEqual(['Gas & Electric']);
    });

    it('matches configured aliases', () => {
        const results = suggestCategories('power', { workspace: root });
        expect(results.map((r) => r.item.label)).toEqual(['Gas & Electric']);
    });

    it('prints score and label', async () => {
        await suggest('gas elec', { limit: 1, workspace: root });
        expect(console.log).toHaveBeenCalledWith('   556.0  Gas & Electric');
    });

    it('says so when nothing matches', async () => {
        await suggest('zzzzzz', { workspace: root });
        expect(console.info).toHaveBeenCalledWith('ℹ No categories match "zzzzzz".');
    });
});
