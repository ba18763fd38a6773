/**
 * @file Blocking stall used to model media access time.
 */

export type StallFn = (ms: number) => void;

let waitCell: Int32Array | undefined;

/**
 * Blocks the calling thread for `ms` milliseconds. The cell is never
 * notified, so the wait always runs to its timeout.
 */
export const blockingStall: StallFn = (ms) => {
  if (!(ms > 0)) {
    return;
  }
  if (waitCell === undefined) {
    waitCell = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
  }
  Atomics.wait(waitCell, 0, 0, ms);
};
