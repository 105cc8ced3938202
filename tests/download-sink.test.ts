/**
 * @jest-environment jsdom
 */
import { DownloadLinkSink } from "../src/core/download-sink"

describe('DownloadLinkSink', () => {
  test('clicks a temporary link carrying the data url and file name', () => {
    let clicked: { href: string; download: string } | null = null
    const click = jest.spyOn(HTMLAnchorElement.prototype, 'click').mockImplementation(() => {
      const link = document.body.querySelector('a')
      if (link) clicked = { href: link.href, download: link.download }
    })

    new DownloadLinkSink(document).exportImage('data:image/png;base64,AAAA', 'canvas.png')

    expect(click).toHaveBeenCalledTimes(1)
    expect(clicked).toEqual({ href: 'data:image/png;base64,AAAA', download: 'canvas.png' })
    expect(document.body.querySelector('a')).toBeNull()

    click.mockRestore()
  })
})
