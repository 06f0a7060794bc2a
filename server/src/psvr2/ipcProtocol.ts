import { MalformedMessageError } from '../gaze/errors';
import { GazeVector } from '../gaze/types';

/*
 * PlayStation VR2 toolkit IPC records. Little-endian, packed.
 *
 *   header            type u32 @0 | dataLen i32 @4                                  8 bytes
 *   handshake request ipcVersion u16 @0 | processId u32 @2                         6 bytes
 *   handshake result  result u8 @0 | ipcVersion u16 @1                             3 bytes
 *   eye result        originValid u8 @0 | originMm f32x3 @1 | dirValid u8 @13 |
 *                     dirNorm f32x3 @14 | pupilValid u8 @26 | pupilMm f32 @27 |
 *                     blinkValid u8 @31 | blink u8 @32                            33 bytes
 *   gaze result       left eye @0 | right eye @33                                  66 bytes
 */

export const IPC_SERVER_PORT = 3364;
export const IPC_VERSION = 1;

export const CommandType = {
    Unknown: 0,
    ClientPing: 1,
    ServerPong: 2,
    ClientRequestHandshake: 3,
    ServerHandshakeResult: 4,
    ClientRequestGazeData: 5,
    ServerGazeDataResult: 6,
} as const;
export type CommandType = typeof CommandType[keyof typeof CommandType];

export const HandshakeResult = {
    Unknown: 0,
    Success: 1,
    Failed: 2,
    Outdated: 3,
} as const;

export const HEADER_SIZE = 8;
export const HANDSHAKE_REQUEST_SIZE = 6;
export const HANDSHAKE_RESULT_SIZE = 3;
export const EYE_RESULT_SIZE = 33;
export const GAZE_RESULT_SIZE = EYE_RESULT_SIZE * 2;

export const HANDSHAKE_RESPONSE_BYTES = HEADER_SIZE + HANDSHAKE_RESULT_SIZE;
export const GAZE_RESPONSE_BYTES = HEADER_SIZE + GAZE_RESULT_SIZE;

export interface CommandHeader {
    type: number;
    dataLen: number;
}

export interface HandshakeResponse {
    header: CommandHeader;
    result: number;
    ipcVersion: number;
}

export interface RawEyeSample {
    isGazeOriginValid: boolean;
    gazeOriginMm: GazeVector;
    isGazeDirValid: boolean;
    gazeDirNorm: GazeVector;
    isPupilDiaValid: boolean;
    pupilDiaMm: number;
    isBlinkValid: boolean;
    blink: boolean;
}

export interface GazeDataResponse {
    header: CommandHeader;
    leftEye: RawEyeSample;
    rightEye: RawEyeSample;
}

export class IpcDecodeError extends MalformedMessageError {
    constructor(message: string) {
        super(message);
        this.name = 'IpcDecodeError';
    }
}

function writeHeader(buf: Buffer, type: CommandType, dataLen: number): void {
    buf.writeUInt32LE(type, 0);
    buf.writeInt32LE(dataLen, 4);
}

export function readHeader(buf: Buffer): CommandHeader {
    if (buf.length < HEADER_SIZE) {
        throw new IpcDecodeError(`header needs ${HEADER_SIZE} bytes, got ${buf.length}`);
    }
    return { type: buf.readUInt32LE(0), dataLen: buf.readInt32LE(4) };
}

function expectRecord(buf: Buffer, type: CommandType, payloadSize: number): CommandHeader {
    if (buf.length !== HEADER_SIZE + payloadSize) {
        throw new IpcDecodeError(`expected ${HEADER_SIZE + payloadSize} bytes, got ${buf.length}`);
    }
    const header = readHeader(buf);
    if (header.type !== type) {
        throw new IpcDecodeError(`expected command ${type}, got ${header.type}`);
    }
    if (header.dataLen !== payloadSize) {
        throw new IpcDecodeError(`expected payload of ${payloadSize} bytes, header says ${header.dataLen}`);
    }
    return header;
}

export function encodeHandshakeRequest(processId: number, ipcVersion: number = IPC_VERSION): Buffer {
    const buf = Buffer.alloc(HEADER_SIZE + HANDSHAKE_REQUEST_SIZE);
    writeHeader(buf, CommandType.ClientRequestHandshake, HANDSHAKE_REQUEST_SIZE);
    buf.writeUInt16LE(ipcVersion, HEADER_SIZE);
    buf.writeUInt32LE(processId >>> 0, HEADER_SIZE + 2);
    return buf;
}

export function decodeHandshakeRequest(buf: Buffer): { ipcVersion: number; processId: number } {
    expectRecord(buf, CommandType.ClientRequestHandshake, HANDSHAKE_REQUEST_SIZE);
    return {
        ipcVersion: buf.readUInt16LE(HEADER_SIZE),
        processId: buf.readUInt32LE(HEADER_SIZE + 2),
    };
}

export function encodeHandshakeResult(result: number, ipcVersion: number = IPC_VERSION): Buffer {
    const buf = Buffer.alloc(HANDSHAKE_RESPONSE_BYTES);
    writeHeader(buf, CommandType.ServerHandshakeResult, HANDSHAKE_RESULT_SIZE);
    buf.writeUInt8(result, HEADER_SIZE);
    buf.writeUInt16LE(ipcVersion, HEADER_SIZE + 1);
    return buf;
}

// 크기와 dataLen 만 검사, type 과 result 는 호출 측에서 판단
export function decodeHandshakeResult(buf: Buffer): HandshakeResponse {
    if (buf.length !== HANDSHAKE_RESPONSE_BYTES) {
        throw new IpcDecodeError(`expected ${HANDSHAKE_RESPONSE_BYTES} bytes, got ${buf.length}`);
    }
    const header = readHeader(buf);
    if (header.dataLen !== HANDSHAKE_RESULT_SIZE) {
        throw new IpcDecodeError(`expected payload of ${HANDSHAKE_RESULT_SIZE} bytes, header says ${header.dataLen}`);
    }
    return {
        header,
        result: buf.readUInt8(HEADER_SIZE),
        ipcVersion: buf.readUInt16LE(HEADER_SIZE + 1),
    };
}

export function encodeGazeDataRequest(): Buffer {
    const buf = Buffer.alloc(HEADER_SIZE);
    writeHeader(buf, CommandType.ClientRequestGazeData, 0);
    return buf;
}

function readVector(buf: Buffer, offset: number): GazeVector {
    return {
        x: buf.readFloatLE(offset),
        y: buf.readFloatLE(offset + 4),
        z: buf.readFloatLE(offset + 8),
    };
}

function writeVector(buf: Buffer, offset: number, v: GazeVector): void {
    buf.writeFloatLE(v.x, offset);
    buf.writeFloatLE(v.y, offset + 4);
    buf.writeFloatLE(v.z, offset + 8);
}

function readEye(buf: Buffer, offset: number): RawEyeSample {
    return {
        isGazeOriginValid: buf.readUInt8(offset) !== 0,
        gazeOriginMm: readVector(buf, offset + 1),
        isGazeDirValid: buf.readUInt8(offset + 13) !== 0,
        gazeDirNorm: readVector(buf, offset + 14),
        isPupilDiaValid: buf.readUInt8(offset + 26) !== 0,
        pupilDiaMm: buf.readFloatLE(offset + 27),
        isBlinkValid: buf.readUInt8(offset + 31) !== 0,
        blink: buf.readUInt8(offset + 32) !== 0,
    };
}

function writeEye(buf: Buffer, offset: number, eye: RawEyeSample): void {
    buf.writeUInt8(eye.isGazeOriginValid ? 1 : 0, offset);
    writeVector(buf, offset + 1, eye.gazeOriginMm);
    buf.writeUInt8(eye.isGazeDirValid ? 1 : 0, offset + 13);
    writeVector(buf, offset + 14, eye.gazeDirNorm);
    buf.writeUInt8(eye.isPupilDiaValid ? 1 : 0, offset + 26);
    buf.writeFloatLE(eye.pupilDiaMm, offset + 27);
    buf.writeUInt8(eye.isBlinkValid ? 1 : 0, offset + 31);
    buf.writeUInt8(eye.blink ? 1 : 0, offset + 32);
}

export function encodeGazeDataResult(leftEye: RawEyeSample, rightEye: RawEyeSample): Buffer {
    const buf = Buffer.alloc(GAZE_RESPONSE_BYTES);
    writeHeader(buf, CommandType.ServerGazeDataResult, GAZE_RESULT_SIZE);
    writeEye(buf, HEADER_SIZE, leftEye);
    writeEye(buf, HEADER_SIZE + EYE_RESULT_SIZE, rightEye);
    return buf;
}

export function decodeGazeDataResult(buf: Buffer): GazeDataResponse {
    const header = expectRecord(buf, CommandType.ServerGazeDataResult, GAZE_RESULT_SIZE);
    return {
        header,
        leftEye: readEye(buf, HEADER_SIZE),
        rightEye: readEye(buf, HEADER_SIZE + EYE_RESULT_SIZE),
    };
}
