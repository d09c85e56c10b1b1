import { describe, it, expect, vi, afterEach } from 'vitest';
import { error, result, setSilentMode, warn } from '../src/output/logger';

describe('logger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
        setSilentMode(false);
    });

    it('silences warnings in silent mode', () => {
        const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

        setSilentMode(true);
        warn('hidden');
        setSilentMode(false);
        warn('shown');

        expect(warnSpy.mock.calls).toEqual([['shown']]);
    });

    it('never silences errors or the result line', () => {
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

        setSilentMode(true);
        result('false');
        error('boom');

        expect(logSpy).toHaveBeenCalledWith('false');
        expect(errorSpy).toHaveBeenCalledWith('boom');
    });
});
