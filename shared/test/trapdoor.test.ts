import assert from 'node:assert'
import { describe, test } from 'node:test'
import { Room } from '../src/room.js'
import { pickTrapdoorDestination } from '../src/trapdoor.js'

describe('pickTrapdoorDestination', () => {
    test('returns undefined for an ordinary room', () => {
        const room = new Room('in a hall')
        room.addTrapdoorDestination(new Room('in a pit'))
        assert.equal(pickTrapdoorDestination(room, () => 0), undefined)
    })

    test('returns undefined for a trapdoor with nowhere to go', () => {
        assert.equal(pickTrapdoorDestination(new Room('on a trapdoor', true), () => 0), undefined)
    })

    test('maps the random value onto the destination list', () => {
        const trap = new Room('on a trapdoor', true)
        const a = new Room('in a pit')
        const b = new Room('in a sewer')
        const c = new Room('in a crypt')
        trap.addTrapdoorDestination(a)
        trap.addTrapdoorDestination(b)
        trap.addTrapdoorDestination(c)

        assert.strictEqual(pickTrapdoorDestination(trap, () => 0), a)
        assert.strictEqual(pickTrapdoorDestination(trap, () => 0.5), b)
        assert.strictEqual(pickTrapdoorDestination(trap, () => 0.99), c)
    })

    test('clamps out-of-range random values', () => {
        const trap = new Room('on a trapdoor', true)
        const a = new Room('in a pit')
        const b = new Room('in a sewer')
        trap.addTrapdoorDestination(a)
        trap.addTrapdoorDestination(b)

        assert.strictEqual(pickTrapdoorDestination(trap, () => 1), b)
        assert.strictEqual(pickTrapdoorDestination(trap, () => -0.5), a)
    })

    test('NaN from the random source picks the first destination', () => {
        const trap = new Room('on a trapdoor', true)
        const a = new Room('in a pit')
        trap.addTrapdoorDestination(a)
        trap.addTrapdoorDestination(new Room('in a sewer'))

        assert.strictEqual(pickTrapdoorDestination(trap, () => Number.NaN), a)
    })
})
