import type { Batch } from '../transaction/Batch';
import { isTransaction } from '../transaction/Transaction';
import type { Transaction } from '../transaction/Transaction';
import { uowMetrics } from '../monitoring/metrics';

/**
 * Active units of work of one client, innermost last. Not synchronized:
 * a client must not be shared by concurrent flows without outside locking.
 */
export class UnitOfWorkStack {
  private entries: Batch[] = [];

  push(batch: Batch): void {
    this.entries.push(batch);
    uowMetrics.activeUnitsOfWork.inc();
  }

  pop(): Batch | null {
    const popped = this.entries.pop();
    if (popped === undefined) return null;
    uowMetrics.activeUnitsOfWork.dec();
    return popped;
  }

  peek(): Batch | null {
    return this.entries.length > 0 ? this.entries[this.entries.length - 1] : null;
  }

  /** The top entry when it is a transaction; a plain batch on top masks any below it. */
  peekTransaction(): Transaction | null {
    const top = this.peek();
    return top !== null && isTransaction(top) ? top : null;
  }

  get depth(): number {
    return this.entries.length;
  }
}
