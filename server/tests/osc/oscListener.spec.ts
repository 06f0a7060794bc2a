import { OscMessage } from 'osc-min';
import { describe, expect, it, jest } from '@jest/globals';
import { messagesOf, OscUdpListener } from '../../src/osc/oscListener';

const at = (address: string): OscMessage => ({ oscType: 'message', address, args: [] });

describe('messagesOf', () => {
    it('yields a bare message as is', () => {
        expect([...messagesOf(at('/a'))]).toEqual([at('/a')]);
    });

    it('flattens nested bundles in order', () => {
        const packet = {
            oscType: 'bundle' as const,
            timetag: [0, 1] as [number, number],
            elements: [
                at('/a'),
                { oscType: 'bundle' as const, timetag: [0, 1] as [number, number], elements: [at('/b'), at('/c')] },
                at('/d'),
            ],
        };

        expect([...messagesOf(packet)].map((message) => message.address)).toEqual(['/a', '/b', '/c', '/d']);
    });
});

describe('OscUdpListener', () => {
    it('forwards socket errors before the receive loop runs', async () => {
        const onError = jest.fn();
        const listener = await OscUdpListener.bind(0, '127.0.0.1', onError);

        const failure = new Error('EHOSTUNREACH');
        listener['socket'].emit('error', failure);

        expect(onError).toHaveBeenCalledWith(failure);
        await listener.close();
    });

    it('resolves every close call once the socket is closed', async () => {
        const listener = await OscUdpListener.bind(0, '127.0.0.1', () => undefined);

        await expect(Promise.all([listener.close(), listener.close()])).resolves.toEqual([undefined, undefined]);
    });
});
