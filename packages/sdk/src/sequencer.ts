/**
 * Per-epoch sequence tracking.
 *
 * Sequence numbers are only meaningful within one physical connection. The
 * server offers no retransmission, so a gap is reported and the stream carries
 * on from the received number.
 */

export type SequenceObservation =
  | { status: 'in-order' }
  | { status: 'gap'; expected: number; received: number };

export class Sequencer {
  private _epoch = 0;
  private _last: number | undefined;
  private _gaps = 0;

  get epoch(): number {
    return this._epoch;
  }

  /** Last observed sequence number in the current epoch, if any. */
  get last(): number | undefined {
    return this._last;
  }

  /** Gaps seen since construction, across epochs. */
  get gaps(): number {
    return this._gaps;
  }

  reset(epoch: number): void {
    this._epoch = epoch;
    this._last = undefined;
  }

  observe(seq: number): SequenceObservation {
    const previous = this._last;
    this._last = seq;

    if (previous !== undefined && seq > previous + 1) {
      this._gaps++;
      return { status: 'gap', expected: previous + 1, received: seq };
    }
    return { status: 'in-order' };
  }
}
