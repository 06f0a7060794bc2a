import { OscArgument, OscMessage } from 'osc-min';
import { BaseGazeSource, emitSafely } from '../gaze/baseSource';
import { monotonicClock } from '../gaze/clock';
import { describeError, MalformedMessageError } from '../gaze/errors';
import { EyePitchYaw, pitchYawToViewSpace } from '../gaze/vector';
import { Clock, GazeEventSink } from '../gaze/types';
import { OscUdpListener } from './oscListener';

export const EYE_TRACKING_ADDRESS = '/tracking/eye/LeftRightPitchYaw';
export const VRCHAT_OSC_PORT = 9000;

export interface VrchatOscOptions {
    port: number;
    address: string;
}

export const DEFAULT_VRCHAT_OSC_OPTIONS: VrchatOscOptions = {
    port: VRCHAT_OSC_PORT,
    address: '0.0.0.0',
};

export interface EyeAngles {
    left: EyePitchYaw;
    right: EyePitchYaw;
}

function floatAt(args: OscArgument[], index: number): number {
    const arg = args[index];
    if (!arg || arg.type !== 'float' || typeof arg.value !== 'number') {
        throw new MalformedMessageError(`argument ${index} of ${EYE_TRACKING_ADDRESS} must be a float32`);
    }
    return arg.value;
}

// {leftPitch, leftYaw, rightPitch, rightYaw}, 단위 도
export function readEyeAngles(message: OscMessage): EyeAngles {
    if (message.args.length !== 4) {
        throw new MalformedMessageError(`${EYE_TRACKING_ADDRESS} takes 4 arguments, got ${message.args.length}`);
    }
    return {
        left: { pitch: floatAt(message.args, 0), yaw: floatAt(message.args, 1) },
        right: { pitch: floatAt(message.args, 2), yaw: floatAt(message.args, 3) },
    };
}

function anglesHaveNaN({ left, right }: EyeAngles): boolean {
    return [left.pitch, left.yaw, right.pitch, right.yaw].some(Number.isNaN);
}

export class VrchatOscSource extends BaseGazeSource {
    private constructor(
        private readonly listener: OscUdpListener,
        clock: Clock,
        events: GazeEventSink,
    ) {
        super('vrchat-osc', clock, events);
    }

    // 포트를 바인드할 수 없으면 ConnectionFailedError
    static async open(
        overrides: Partial<VrchatOscOptions> = {},
        clock: Clock = monotonicClock,
        events: GazeEventSink = () => undefined,
    ): Promise<VrchatOscSource> {
        const options = { ...DEFAULT_VRCHAT_OSC_OPTIONS, ...overrides };
        const listener = await OscUdpListener.bind(options.port, options.address, (err) =>
            emitSafely(events, { type: 'transport-error', tracker: 'vrchat-osc', detail: err.message }),
        );
        return new VrchatOscSource(listener, clock, events);
    }

    get port(): number {
        return this.listener.port;
    }

    processMessage(message: OscMessage): void {
        if (message.address !== EYE_TRACKING_ADDRESS) {
            return;
        }

        let angles: EyeAngles;
        try {
            angles = readEyeAngles(message);
        } catch (err) {
            this.emit({ type: 'malformed-message', tracker: this.getType(), detail: describeError(err) });
            return;
        }

        if (anglesHaveNaN(angles)) {
            this.emit({ type: 'sample-discarded', tracker: this.getType(), reason: 'nan' });
            return;
        }
        this.publish(pitchYawToViewSpace(angles.left, angles.right));
    }

    protected runLoop(): Promise<void> {
        return this.listener.run({
            onMessage: (message) => this.processMessage(message),
            onMalformed: (err, remote) =>
                this.emit({
                    type: 'malformed-message',
                    tracker: this.getType(),
                    detail: `${remote.address}:${remote.port} ${describeError(err)}`,
                }),
        });
    }

    protected interrupt(): void {
        // 대기 중인 수신을 끊는다
        void this.listener.close();
    }

    protected releaseTransport(): Promise<void> {
        return this.listener.close();
    }
}
