export type FormStatus = "pending" | "finished" | "canceled";
export type SettledStatus = Exclude<FormStatus, "pending">;

/**
 * Write-once completion cell. The first `resolve` wins; later calls are
 * no-ops and report `false`.
 */
export class FormOutcome {
  private _status: FormStatus = "pending";
  private readonly settled: Promise<SettledStatus>;
  private readonly settle: (status: SettledStatus) => void;

  constructor() {
    let settle: (status: SettledStatus) => void = () => undefined;
    this.settled = new Promise<SettledStatus>((resolve) => {
      settle = resolve;
    });
    this.settle = settle;
  }

  get status(): FormStatus {
    return this._status;
  }

  isSettled(): boolean {
    return this._status !== "pending";
  }

  resolve(status: SettledStatus): boolean {
    if (this._status !== "pending") return false;
    this._status = status;
    this.settle(status);
    return true;
  }

  wait(): Promise<SettledStatus> {
    return this.settled;
  }
}
