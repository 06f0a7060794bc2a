import { NS_PER_SECOND } from './clock';
import { GazeVector, HostTime } from './types';

export const STALENESS_THRESHOLD_NS = NS_PER_SECOND;

export interface GazeSample {
    vector: GazeVector;
    receivedAt: HostTime;
}

// 백엔드별 최신 gaze. 수집 루프가 쓰고 호스트가 매 프레임 읽는다.
// 모든 메서드는 동기 (await 금지)
export class GazeCell {
    private sample: GazeSample | null = null;

    // receivedAt 이 뒤로 가면 false
    publish(vector: GazeVector, receivedAt: HostTime): boolean {
        if (this.sample && receivedAt < this.sample.receivedAt) {
            return false;
        }
        this.sample = { vector: { x: vector.x, y: vector.y, z: vector.z }, receivedAt };
        return true;
    }

    isFresh(now: HostTime): boolean {
        if (!this.sample) {
            return false;
        }
        return now - this.sample.receivedAt < STALENESS_THRESHOLD_NS;
    }

    copyInto(now: HostTime, out: GazeVector): boolean {
        if (!this.sample || !this.isFresh(now)) {
            return false;
        }
        out.x = this.sample.vector.x;
        out.y = this.sample.vector.y;
        out.z = this.sample.vector.z;
        return true;
    }
}
