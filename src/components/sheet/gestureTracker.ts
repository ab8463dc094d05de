import type { GesturePhase, GestureSample, Point } from './dragController';

const VELOCITY_WINDOW = 3;

/**
 * Turns one pointer sequence into gesture samples. Translation is measured
 * from the start point; velocity is the mean of the last few frame
 * velocities, in units per second.
 */
export class GestureTracker {
  private readonly start: Point;
  private last: Point;
  private lastTime: number;
  private readonly velocities: Point[] = [];

  constructor(x: number, y: number, time: number) {
    this.start = { x, y };
    this.last = { x, y };
    this.lastTime = time;
  }

  began(): GestureSample {
    return this.sample('began');
  }

  /** Pointer travel since the start, without recording a frame. */
  travel(x: number, y: number): Point {
    return { x: x - this.start.x, y: y - this.start.y };
  }

  move(x: number, y: number, time: number): GestureSample {
    this.record(x, y, time);
    return this.sample('changed');
  }

  end(x: number, y: number, time: number): GestureSample {
    if (x !== this.last.x || y !== this.last.y) this.record(x, y, time);
    return this.sample('ended');
  }

  cancel(): GestureSample {
    return this.sample('cancelled');
  }

  get velocity(): Point {
    if (this.velocities.length === 0) return { x: 0, y: 0 };
    const sum = this.velocities.reduce((acc, v) => ({ x: acc.x + v.x, y: acc.y + v.y }), { x: 0, y: 0 });
    return { x: sum.x / this.velocities.length, y: sum.y / this.velocities.length };
  }

  private record(x: number, y: number, time: number) {
    const frameMs = Math.max(1, time - this.lastTime);
    this.velocities.push({
      x: ((x - this.last.x) / frameMs) * 1000,
      y: ((y - this.last.y) / frameMs) * 1000,
    });
    if (this.velocities.length > VELOCITY_WINDOW) this.velocities.shift();
    this.last = { x, y };
    this.lastTime = time;
  }

  private sample(phase: GesturePhase): GestureSample {
    return { phase, translation: this.travel(this.last.x, this.last.y), velocity: this.velocity };
  }
}
