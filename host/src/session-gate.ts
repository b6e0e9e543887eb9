/**
 * Admission control for run-once mode.
 *
 * `tryAdmit()` is a synchronous test-and-set: request handlers run on a single
 * event loop, so no two callers can observe the flag as unset.
 */
export class SessionGate {
  private shuttingDown = false;

  constructor(readonly runOnce: boolean) {}

  /** True once run-once mode has admitted its single session */
  isRefusing() {
    return this.shuttingDown;
  }

  /**
   * Admit a new session attempt.
   *
   * @returns false when the request must be refused
   */
  tryAdmit(): boolean {
    if (this.shuttingDown) return false;
    if (this.runOnce) {
      this.shuttingDown = true;
    }
    return true;
  }
}
