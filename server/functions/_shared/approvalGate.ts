import { AlreadyDecidedError, InvalidTransitionError } from './errors'
import type { JobStore } from './jobStore'
import type { Decision, Job } from './types'

/**
 * Single-decision gate for manual jobs. The first decision wins and is kept
 * on the job; any later one fails with the decision that was preserved.
 */
export class ApprovalGate {
  private readonly store: JobStore

  constructor(store: JobStore) {
    this.store = store
  }

  approve(jobId: string): Job {
    return this.decide(jobId, 'approved')
  }

  reject(jobId: string): Job {
    return this.decide(jobId, 'rejected')
  }

  private decide(jobId: string, decision: Decision): Job {
    const job = this.store.get(jobId)
    if (job.workflow !== 'manual') {
      throw new InvalidTransitionError(jobId, job.status, decision, 'approval applies to manual jobs only')
    }
    if (job.decision) throw new AlreadyDecidedError(jobId, job.decision)
    return this.store.transition(jobId, ['awaiting_approval'], decision, { decision })
  }
}
