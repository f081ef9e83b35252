import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { DEFAULT_CONFIG, ENV_LOG_LEVEL, ENV_TEXT_INDENT, loadConfig } from '../Config.js';
import { Level } from '../Logger.js';

describe('loadConfig', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('falls back to the defaults', () => {
        expect(loadConfig({})).toEqual({ logLevel: Level.WARNING, textIndent: 0 });
        expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
    });

    it('reads the level case-insensitively and the indent', () => {
        const config = loadConfig({ [ENV_LOG_LEVEL]: ' debug ', [ENV_TEXT_INDENT]: '2' });
        expect(config).toEqual({ logLevel: Level.DEBUG, textIndent: 2 });
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('ignores invalid values with a warning', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const config = loadConfig({ [ENV_LOG_LEVEL]: 'LOUD', [ENV_TEXT_INDENT]: '-1' });
        expect(config).toEqual({ logLevel: Level.WARNING, textIndent: 0 });
        expect(warn).toHaveBeenCalledTimes(2);
    });

    it('rejects fractional and oversized indents', () => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        expect(loadConfig({ [ENV_TEXT_INDENT]: '1.5' }).textIndent).toBe(0);
        expect(loadConfig({ [ENV_TEXT_INDENT]: '11' }).textIndent).toBe(0);
    });
});
