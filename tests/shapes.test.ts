import { rgb } from "../src/core/color"
import { circle, rectangle, normalizedBounds, renderShape } from "../src/core/shapes"
import { RecordingSurface } from "./helpers/recording-surface"

const red = rgb(255, 0, 0)
const blue = rgb(0, 0, 255)

describe('renderShape', () => {
  test('circle is a full arc filled with the css color', () => {
    const surface = new RecordingSurface()
    renderShape(circle(10, 20, 5, red), surface)
    expect(surface.ops).toEqual([
      { op: 'fillArc', cx: 10, cy: 20, r: 5, start: 0, end: Math.PI * 2, color: 'rgb(255, 0, 0)' },
    ])
  })

  test('rectangle fills from the first corner with signed extents', () => {
    const surface = new RecordingSurface()
    renderShape(rectangle(50, 40, 10, 60, blue), surface)
    expect(surface.ops).toEqual([
      { op: 'fillRect', x: 50, y: 40, w: -40, h: 20, color: 'rgb(0, 0, 255)' },
    ])
  })

  test('alpha colors render as rgba', () => {
    const surface = new RecordingSurface()
    renderShape(rectangle(0, 0, 1, 1, rgb(1, 2, 3, 0.25)), surface)
    expect(surface.ops).toEqual([
      { op: 'fillRect', x: 0, y: 0, w: 1, h: 1, color: 'rgba(1, 2, 3, 0.25)' },
    ])
  })
})

describe('shape values', () => {
  test('shapes are frozen', () => {
    expect(Object.isFrozen(circle(0, 0, 1, red))).toBe(true)
    expect(Object.isFrozen(rectangle(0, 0, 1, 1, red))).toBe(true)
  })

  test('negative radius is clamped to zero', () => {
    expect(circle(0, 0, -3, red).radius).toBe(0)
  })

  test('degenerate rectangles are legal', () => {
    expect(normalizedBounds(rectangle(7, 7, 7, 7, red))).toEqual({ x: 7, y: 7, width: 0, height: 0 })
  })

  test('normalizedBounds orders corners by min/max', () => {
    expect(normalizedBounds(rectangle(50, 5, 5, 50, red))).toEqual({ x: 5, y: 5, width: 45, height: 45 })
  })
})
