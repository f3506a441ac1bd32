import { describe, it, expect, afterEach } from 'vitest';
import { Logger, LogEntry } from './Logger';

describe('Logger', () => {
    afterEach(() => Logger.setLevel('info'));

    it('should notify subscribers until they unsubscribe', () => {
        const received: LogEntry[] = [];
        const unsubscribe = Logger.subscribe(entry => received.push(entry));

        Logger.warn('[Test] first', { id: 1 });
        unsubscribe();
        Logger.warn('[Test] second');

        expect(received).toHaveLength(1);
        expect(received[0].level).toBe('warn');
        expect(received[0].message).toBe('[Test] first');
        expect(received[0].data).toEqual({ id: 1 });
    });

    it('should drop entries below the minimum level', () => {
        const received: string[] = [];
        const unsubscribe = Logger.subscribe(entry => received.push(entry.level));

        Logger.setLevel('warn');
        Logger.debug('[Test] hidden');
        Logger.info('[Test] hidden');
        Logger.error('[Test] shown');
        unsubscribe();

        expect(received).toEqual(['error']);
    });
});
