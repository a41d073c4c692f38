import { describe, it, expect } from 'vitest'
import { Mutex } from './mutex.js'

describe('Mutex', () => {
    it('serves waiters in arrival order', async () => {
        const mutex = new Mutex()
        const order: string[] = []

        const task = (name: string) => mutex.runExclusive(async () => {
            order.push(`start:${name}`)
            await Promise.resolve()
            order.push(`end:${name}`)
        })

        await Promise.all([task('a'), task('b'), task('c')])

        expect(order).toEqual(['start:a', 'end:a', 'start:b', 'end:b', 'start:c', 'end:c'])
        expect(mutex.isLocked).toBe(false)
    })

    it('releases the lock when the task throws', async () => {
        const mutex = new Mutex()

        await expect(mutex.runExclusive(async () => { throw new Error('boom') })).rejects.toThrow('boom')

        expect(mutex.isLocked).toBe(false)
        await expect(mutex.runExclusive(async () => 'ok')).resolves.toBe('ok')
    })

    it('ignores a second release from the same holder', async () => {
        const mutex = new Mutex()
        const release = await mutex.acquire()
        const waiting = mutex.acquire()
        expect(mutex.queued).toBe(1)

        release()
        release()

        const releaseNext = await waiting
        expect(mutex.isLocked).toBe(true)
        releaseNext()
        expect(mutex.isLocked).toBe(false)
    })
})
