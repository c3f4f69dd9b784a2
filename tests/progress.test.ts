import { autorun } from 'mobx';
import { describe, expect, it } from 'vitest';
import { ProgressState } from '../src/progress';

describe('ProgressState', () => {
    it('keeps only the most recent log lines', () => {
        const state = new ProgressState();
        for(let i = 1; i <= 7; i++) state.log(`line ${i}`);
        expect(state.logLines).toEqual(['line 3', 'line 4', 'line 5', 'line 6', 'line 7']);
    });

    it('notifies observers of counter changes', () => {
        const state = new ProgressState();
        const seen: number[] = [];
        const dispose = autorun(() => { seen.push(state.usefulTypes); });
        state.usefulTypes++;
        state.usefulTypes++;
        dispose();
        expect(seen).toEqual([0, 1, 2]);
    });
});
