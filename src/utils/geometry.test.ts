import { describe, it, expect } from 'vitest'
import { angleDegrees, clamp, distanceBetween, formatPoints, normalizeDeg } from './geometry'

describe('distanceBetween', () => {
  it('returns 0 for identical points', () => {
    expect(distanceBetween({ x: 5, y: 10 }, { x: 5, y: 10 })).toBe(0)
  })

  it('returns hypotenuse for diagonal', () => {
    expect(distanceBetween({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5)
  })

  it('is symmetric', () => {
    const a = { x: 1, y: 2 }
    const b = { x: -3, y: 5 }
    expect(distanceBetween(a, b)).toBe(distanceBetween(b, a))
  })
})

describe('normalizeDeg', () => {
  it('keeps 0 as 0', () => expect(normalizeDeg(0)).toBe(0))
  it('wraps 360 to 0', () => expect(normalizeDeg(360)).toBe(0))
  it('wraps -360 to 0', () => expect(normalizeDeg(-360)).toBe(0))
  it('wraps -45 to 315', () => expect(normalizeDeg(-45)).toBe(315))
  it('wraps 370 to 10', () => expect(normalizeDeg(370)).toBe(10))
})

describe('angleDegrees', () => {
  const origin = { x: 0, y: 0 }

  it('+y is 0°', () => expect(angleDegrees(origin, { x: 0, y: 1 })).toBeCloseTo(0, 10))
  it('-x is 90°', () => expect(angleDegrees(origin, { x: -1, y: 0 })).toBeCloseTo(90, 10))
  it('-y is 180°', () => expect(angleDegrees(origin, { x: 0, y: -1 })).toBeCloseTo(180, 10))
  it('+x is 270°', () => expect(angleDegrees(origin, { x: 1, y: 0 })).toBeCloseTo(270, 10))

  it('stays within [0, 360)', () => {
    const v = angleDegrees({ x: 10, y: 10 }, { x: 10.0001, y: 11 })
    expect(v).toBeGreaterThanOrEqual(0)
    expect(v).toBeLessThan(360)
  })
})

describe('clamp', () => {
  it('returns min when below', () => expect(clamp(-1, 0, 10)).toBe(0))
  it('returns max when above', () => expect(clamp(11, 0, 10)).toBe(10))
})

describe('formatPoints', () => {
  it('joins points as x,y pairs', () => {
    expect(formatPoints([{ x: 1, y: 2.5 }, { x: -3, y: 0 }])).toBe('1.00,2.50;-3.00,0.00')
  })

  it('returns an empty string for no points', () => {
    expect(formatPoints([])).toBe('')
  })
})
