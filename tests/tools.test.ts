import { rgb } from "../src/core/color"
import { circle, rectangle, type Shape } from "../src/core/shapes"
import {
  cancelGesture,
  createTool,
  endGesture,
  getToolByHotkey,
  isToolId,
  moveGesture,
  setPrimaryColor,
  setSecondaryColor,
  startGesture,
  type ToolContext,
} from "../src/core/tools"

const blue = rgb(0, 0, 255)
const green = rgb(0, 255, 0)
const options = { brushRadius: 5 }

class FakeContext implements ToolContext {
  commits: Shape[] = []
  previews: Shape[] = []
  previewClears = 0

  commit(shape: Shape) {
    this.commits.push(shape)
  }

  showPreview(shape: Shape) {
    this.previews.push(shape)
  }

  clearPreview() {
    this.previewClears++
  }
}

describe('brush', () => {
  test('commits a dab on start and on every move', () => {
    const tool = createTool('brush', blue, options)
    const tc = new FakeContext()

    startGesture(tool, tc, { x: 10, y: 10 })
    moveGesture(tool, tc, { x: 20, y: 10 })
    moveGesture(tool, tc, { x: 20, y: 10 })
    endGesture(tool, tc, { x: 20, y: 10 })

    expect(tc.commits).toEqual([
      circle(10, 10, 5, blue),
      circle(20, 10, 5, blue),
      circle(20, 10, 5, blue),
    ])
    expect(tc.previews).toEqual([])
    expect(tc.previewClears).toBe(0)
  })

  test('does not fill gaps between distant samples', () => {
    const tool = createTool('brush', blue, options)
    const tc = new FakeContext()

    startGesture(tool, tc, { x: 0, y: 0 })
    moveGesture(tool, tc, { x: 200, y: 0 })

    expect(tc.commits).toHaveLength(2)
  })

  test('primary color applies to later dabs only', () => {
    const tool = createTool('brush', blue, options)
    const tc = new FakeContext()

    startGesture(tool, tc, { x: 1, y: 1 })
    setPrimaryColor(tool, green)
    moveGesture(tool, tc, { x: 2, y: 2 })

    expect(tc.commits.map((s) => s.color)).toEqual([blue, green])
  })
})

describe('rectangle', () => {
  test('previews while dragging and commits once on release', () => {
    const tool = createTool('rectangle', blue, options)
    const tc = new FakeContext()

    startGesture(tool, tc, { x: 5, y: 5 })
    expect(tc.commits).toEqual([])

    moveGesture(tool, tc, { x: 30, y: 30 })
    moveGesture(tool, tc, { x: 50, y: 50 })
    expect(tc.previews).toEqual([rectangle(5, 5, 30, 30, blue), rectangle(5, 5, 50, 50, blue)])
    expect(tc.commits).toEqual([])

    endGesture(tool, tc, { x: 50, y: 50 })
    expect(tc.previewClears).toBe(1)
    expect(tc.commits).toEqual([rectangle(5, 5, 50, 50, blue)])
  })

  test('end uses the release point, not the last move', () => {
    const tool = createTool('rectangle', blue, options)
    const tc = new FakeContext()

    startGesture(tool, tc, { x: 5, y: 5 })
    moveGesture(tool, tc, { x: 30, y: 30 })
    endGesture(tool, tc, { x: 40, y: 1 })

    expect(tc.commits).toEqual([rectangle(5, 5, 40, 1, blue)])
  })

  test('move and end without an anchor do nothing', () => {
    const tool = createTool('rectangle', blue, options)
    const tc = new FakeContext()

    moveGesture(tool, tc, { x: 30, y: 30 })
    endGesture(tool, tc, { x: 30, y: 30 })

    expect(tc.previews).toEqual([])
    expect(tc.commits).toEqual([])
    expect(tc.previewClears).toBe(0)
  })

  test('cancel drops the anchor and clears the preview', () => {
    const tool = createTool('rectangle', blue, options)
    const tc = new FakeContext()

    startGesture(tool, tc, { x: 5, y: 5 })
    moveGesture(tool, tc, { x: 10, y: 10 })
    cancelGesture(tool, tc)
    endGesture(tool, tc, { x: 20, y: 20 })

    expect(tc.commits).toEqual([])
    expect(tc.previewClears).toBe(1)
  })
})

describe('secondary color', () => {
  test('changes nothing for either tool', () => {
    for (const id of ['brush', 'rectangle'] as const) {
      const tool = createTool(id, blue, options)
      setSecondaryColor(tool, green)
      expect(tool.color).toBe(blue)
    }
  })
})

describe('registry', () => {
  test('finds tools by hotkey, case-insensitively', () => {
    expect(getToolByHotkey('b')?.id).toBe('brush')
    expect(getToolByHotkey('R')?.id).toBe('rectangle')
    expect(getToolByHotkey('q')).toBeUndefined()
  })

  test('recognizes tool ids', () => {
    expect(isToolId('rectangle')).toBe(true)
    expect(isToolId('lasso')).toBe(false)
  })
})
