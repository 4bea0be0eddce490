export class UpdateLock {
  private holder: string | null = null;

  tryAcquire(holder: string): boolean {
    if (this.holder !== null) {
      return false;
    }
    this.holder = holder;
    return true;
  }

  release(holder: string): void {
    if (this.holder === holder) {
      this.holder = null;
    }
  }

  get heldBy(): string | null {
    return this.holder;
  }
}

/** Flag de "update em andamento" compartilhada por todo o processo. */
export const processUpdateLock = new UpdateLock();
