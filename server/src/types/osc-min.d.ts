// osc-min 1.x 는 타입 선언을 포함하지 않음 (사용하는 부분만)
declare module 'osc-min' {
    export interface OscArgument {
        type: string;
        value?: unknown;
    }

    export interface OscMessage {
        oscType: 'message';
        address: string;
        args: OscArgument[];
    }

    export interface OscBundle {
        oscType: 'bundle';
        timetag: number | [number, number];
        elements: OscPacket[];
    }

    export type OscPacket = OscMessage | OscBundle;

    export function fromBuffer(buffer: Buffer, strict?: boolean): OscPacket;
    export function toBuffer(packet: OscPacket, strict?: boolean): Buffer;
}
