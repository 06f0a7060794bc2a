import { afterEach, describe, expect, it, jest } from '@jest/globals';
import { createConsoleSink } from '../../src/gaze/consoleSink';

describe('createConsoleSink', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('prints per-sample events only when verbose', () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const event = { type: 'sample-published', tracker: 'vrchat-osc', vector: { x: 0, y: 0.5, z: -1 }, at: 1n } as const;

        createConsoleSink()(event);
        expect(log).not.toHaveBeenCalled();

        createConsoleSink({ verbose: true })(event);
        expect(log).toHaveBeenCalledWith('👀 [vrchat-osc] gaze (0.000, 0.500, -1.000)');
    });

    it('warns about unavailable sources', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        createConsoleSink()({ type: 'unavailable', tracker: 'psvr2-toolkit', reason: 'HandshakeFailed', detail: 'refused' });
        expect(warn).toHaveBeenCalledWith('⚠️ [psvr2-toolkit] 사용 불가 (HandshakeFailed): refused');
    });
});
