import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { WorkQueue } from '../fetch/work-queue.js'
import type { WorkItem } from '../types.js'

const T0 = new Date('2026-01-01T00:00:00Z').getTime()

const A = 'https://www.olx.in/item/a'
const B = 'https://www.olx.in/item/b'
const C = 'https://www.olx.in/item/c'

const item = (url: string, overrides: Partial<WorkItem> = {}): WorkItem => ({
  url,
  attempt: 0,
  enqueuedAt: T0,
  kind: 'listing',
  depth: 1,
  ...overrides,
})

describe('WorkQueue', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(T0)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('processes items in FIFO order and resolves once closed and empty', async () => {
    const queue = new WorkQueue()
    queue.push(item(A))
    queue.push(item(B))
    queue.close()

    const seen: string[] = []
    await queue.run(async current => {
      seen.push(current.url)
    }, 1)

    expect(seen).toEqual([A, B])
    expect(queue.isIdle()).toBe(true)
    expect(queue.stats()).toEqual({ state: 'closed', ready: 0, delayed: 0, inFlight: 0, dropped: 0 })
  })

  it('keeps running while open and finishes after close', async () => {
    const queue = new WorkQueue()
    const seen: string[] = []
    const finished = vi.fn()
    const done = queue
      .run(async current => {
        seen.push(current.url)
      }, 2)
      .then(finished)

    queue.push(item(A))
    await vi.advanceTimersByTimeAsync(1)

    expect(seen).toEqual([A])
    expect(finished).not.toHaveBeenCalled()

    queue.close()
    await done
    expect(finished).toHaveBeenCalledTimes(1)
  })

  it('refuses top-level work after close but adopts discovered work', () => {
    const queue = new WorkQueue()
    queue.push(item('https://www.olx.in/items/q-car-cover?page=1'))
    queue.close()

    expect(queue.push(item('https://www.olx.in/item/late'))).toBe(false)
    expect(queue.adopt(item('https://www.olx.in/item/found'))).toBe(true)
    expect(queue.stats().ready).toBe(2)
  })

  it('re-submits a retried item after its delay with the attempt incremented', async () => {
    const queue = new WorkQueue()
    queue.push(item(A))
    queue.close()

    const seen: WorkItem[] = []
    const done = queue.run(async current => {
      seen.push(current)
      if (current.attempt === 0) queue.retryLater(current, 1000)
    }, 1)

    await vi.advanceTimersByTimeAsync(1)
    expect(queue.stats()).toMatchObject({ ready: 0, delayed: 1, inFlight: 0 })
    expect(queue.isIdle()).toBe(false)

    await vi.advanceTimersByTimeAsync(999)
    await done

    expect(seen).toHaveLength(2)
    expect(seen[1]).toMatchObject({ url: A, attempt: 1, notBefore: T0 + 1000 })
  })

  it('drain drops unstarted work but lets retries finish', async () => {
    const queue = new WorkQueue()
    queue.push(item(A))
    queue.push(item(B))
    queue.push(item(C))
    queue.close()

    const seen: string[] = []
    let dropped = -1
    const done = queue.run(async current => {
      seen.push(current.url)
      if (current.attempt === 0) {
        queue.retryLater(current, 500)
        dropped = queue.drain()
      }
    }, 1)

    await vi.advanceTimersByTimeAsync(1)
    expect(dropped).toBe(2)
    expect(queue.adopt(item('https://www.olx.in/item/d'))).toBe(false)

    await vi.advanceTimersByTimeAsync(499)
    await done

    expect(seen).toEqual([A, A])
    expect(queue.stats()).toMatchObject({ state: 'draining', dropped: 2 })
  })

  it('abort drops queued work and cancels scheduled retries', async () => {
    const queue = new WorkQueue()
    queue.push(item(A))
    queue.push(item(B))
    queue.close()

    const seen: string[] = []
    let dropped = -1
    await queue.run(async current => {
      seen.push(current.url)
      queue.retryLater(current, 10000)
      dropped = queue.abort()
    }, 1)

    expect(seen).toEqual([A])
    expect(dropped).toBe(2)
    expect(queue.retryLater(item(A), 0)).toBe(false)
    expect(queue.stats()).toMatchObject({ state: 'aborted', ready: 0, delayed: 0, dropped: 2 })
  })

  it('aborts and rethrows when the processor fails', async () => {
    const queue = new WorkQueue()
    queue.push(item(A))
    queue.push(item(B))
    queue.close()

    const processor = vi.fn(async () => {
      throw new Error('processor failed')
    })

    await expect(queue.run(processor, 1)).rejects.toThrow('processor failed')
    expect(processor).toHaveBeenCalledTimes(1)
    expect(queue.stats()).toMatchObject({ state: 'aborted', dropped: 1 })
  })

  it('resolves only after the last in-flight item finishes', async () => {
    const queue = new WorkQueue()
    queue.push(item(A))
    queue.close()

    let release: () => void = () => {}
    const finished = vi.fn()
    const done = queue
      .run(
        () =>
          new Promise<void>(resolve => {
            release = resolve
          }),
        1
      )
      .then(finished)

    await vi.advanceTimersByTimeAsync(1)
    expect(finished).not.toHaveBeenCalled()
    expect(queue.stats().inFlight).toBe(1)

    release()
    await done
    expect(finished).toHaveBeenCalledTimes(1)
  })
})
