import { describe, expect, it, vi } from 'vitest'
import { ResponseTracker } from '../ResponseTracker'

vi.mock('@replykit/infra-kit', () => ({
  getLogger: vi.fn(() => ({
    trace: vi.fn(),
    debug: vi.fn(),
  })),
}))

describe('responseTracker', () => {
  it('appends records per invocation', () => {
    const tracker = new ResponseTracker()
    tracker.register('m1', 'c1', 'r1')
    tracker.register('m1', 'c1', 'r2')
    tracker.register('m2', 'c2', 'r3')

    expect(tracker.getResponses('m1').map(r => r.messageId)).toEqual(['r1', 'r2'])
    expect(tracker.getResponses('m2')).toEqual([
      expect.objectContaining({ invocationMessageId: 'm2', channelId: 'c2', messageId: 'r3' }),
    ])
    expect(tracker.size).toBe(3)
  })

  it('returns an empty list for unknown invocations', () => {
    const tracker = new ResponseTracker()
    expect(tracker.getResponses('missing')).toEqual([])
    expect(tracker.has('missing')).toBe(false)
  })

  it('releases records of one invocation', () => {
    const tracker = new ResponseTracker()
    tracker.register('m1', 'c1', 'r1')
    tracker.register('m1', 'c1', 'r2')
    tracker.register('m2', 'c2', 'r3')

    const released = tracker.release('m1')

    expect(released.map(r => r.messageId)).toEqual(['r1', 'r2'])
    expect(tracker.has('m1')).toBe(false)
    expect(tracker.size).toBe(1)
    expect(tracker.release('m1')).toEqual([])
  })
})
