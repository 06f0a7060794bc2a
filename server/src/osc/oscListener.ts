/// <reference path="../types/osc-min.d.ts" />
import dgram from 'dgram';
import { AddressInfo } from 'net';
import { fromBuffer, OscMessage, OscPacket } from 'osc-min';
import { ConnectionFailedError } from '../gaze/errors';

export interface OscDispatch {
    onMessage(message: OscMessage, remote: dgram.RemoteInfo): void;
    onMalformed(err: unknown, remote: dgram.RemoteInfo): void;
}

// 번들은 안쪽 메시지까지 순서대로 펼친다
export function* messagesOf(packet: OscPacket): Generator<OscMessage> {
    if (packet.oscType === 'message') {
        yield packet;
        return;
    }
    for (const element of packet.elements) {
        yield* messagesOf(element);
    }
}

export class OscUdpListener {
    private readonly closed: Promise<void>;
    private closing = false;

    private constructor(
        private readonly socket: dgram.Socket,
        onError: (err: Error) => void,
    ) {
        this.closed = new Promise((resolve) => socket.once('close', () => resolve()));
        socket.on('error', onError);
    }

    static bind(port: number, address: string, onError: (err: Error) => void): Promise<OscUdpListener> {
        return new Promise((resolve, reject) => {
            const socket = dgram.createSocket({ type: 'udp4', reuseAddr: false });
            const onBindError = (err: Error) => {
                socket.close();
                reject(new ConnectionFailedError(`could not bind udp ${address}:${port} (${err.message})`));
            };
            socket.once('error', onBindError);
            socket.bind(port, address, () => {
                socket.off('error', onBindError);
                resolve(new OscUdpListener(socket, onError));
            });
        });
    }

    get port(): number {
        const info: AddressInfo = this.socket.address();
        return info.port;
    }

    // close() 될 때까지 수신, 소켓이 닫히면 resolve
    run(dispatch: OscDispatch): Promise<void> {
        this.socket.on('message', (datagram: Buffer, remote: dgram.RemoteInfo) => {
            let messages: OscMessage[];
            try {
                messages = [...messagesOf(fromBuffer(datagram, true))];
            } catch (err) {
                dispatch.onMalformed(err, remote);
                return;
            }
            for (const message of messages) {
                dispatch.onMessage(message, remote);
            }
        });
        return this.closed;
    }

    close(): Promise<void> {
        if (!this.closing) {
            this.closing = true;
            this.socket.close();
        }
        return this.closed;
    }
}
