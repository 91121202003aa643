import { describe, expect, it } from 'vitest'
import { ApprovalGate } from './approvalGate'
import { AlreadyDecidedError, InvalidTransitionError } from './errors'
import { JobStore } from './jobStore'
import { sequentialIds } from './testing'
import type { Workflow } from './types'

function pendingJob(workflow: Workflow = 'manual', toAwaiting = true) {
  const store = new JobStore({ newId: sequentialIds() })
  store.create({ workflow, title: 'Weekly recap', target_size: { width: 1800, height: 900 } })
  store.transition('job-1', ['queued'], 'generating')
  if (toAwaiting) store.transition('job-1', ['generating'], 'awaiting_approval')
  return { store, gate: new ApprovalGate(store) }
}

describe('ApprovalGate', () => {
  it('records an approval', () => {
    const { store, gate } = pendingJob()
    const job = gate.approve('job-1')
    expect(job.status).toBe('approved')
    expect(job.decision).toBe('approved')
    expect(store.get('job-1').history.map((h) => h.status)).toEqual([
      'queued',
      'generating',
      'awaiting_approval',
      'approved',
    ])
  })

  it('keeps the first decision when a second one arrives', () => {
    const { store, gate } = pendingJob()
    gate.reject('job-1')

    let caught: unknown
    try {
      gate.approve('job-1')
    } catch (e) {
      caught = e
    }
    expect(caught).toBeInstanceOf(AlreadyDecidedError)
    expect(caught instanceof AlreadyDecidedError && caught.decision).toBe('rejected')
    expect(store.get('job-1').status).toBe('rejected')
    expect(() => gate.reject('job-1')).toThrow(AlreadyDecidedError)
  })

  it('refuses decisions before generation has finished', () => {
    const { store, gate } = pendingJob('manual', false)
    expect(() => gate.approve('job-1')).toThrow(InvalidTransitionError)
    expect(store.get('job-1').status).toBe('generating')
    expect(store.get('job-1').decision).toBeNull()
  })

  it('refuses automated jobs', () => {
    const { gate } = pendingJob('automated', false)
    expect(() => gate.reject('job-1')).toThrow('approval applies to manual jobs only')
  })
})
