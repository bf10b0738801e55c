import { describe, expect, it } from 'vitest'

import { detectMediaFromURL, getMediaType } from '~/utils/media-type'

describe('getMediaType', () => {
  it('should classify by file extension', () => {
    expect(getMediaType('https://cdn.test/photo.webp')).toBe('image')
    expect(getMediaType('https://cdn.test/clip.mp4')).toBe('video')
    expect(getMediaType('song.MP3')).toBe('audio')
  })

  it('should ignore query strings and fragments', () => {
    expect(getMediaType('https://cdn.test/photo.webp?w=800')).toBe('image')
    expect(getMediaType('/uploads/clip.mov#t=10')).toBe('video')
  })

  it('should return null for unknown or empty input', () => {
    expect(getMediaType('notes.txt')).toBeNull()
    expect(getMediaType('')).toBeNull()
  })
})

describe('detectMediaFromURL', () => {
  it('should recognize YouTube links', () => {
    expect(detectMediaFromURL('https://www.youtube.com/watch?v=abc123')).toBe(
      'youtube',
    )
    expect(detectMediaFromURL('https://youtu.be/abc123')).toBe('youtube')
    expect(detectMediaFromURL('https://www.youtube.com/embed/abc123')).toBe(
      'youtube',
    )
  })

  it('should recognize Vimeo links', () => {
    expect(detectMediaFromURL('https://vimeo.com/123456')).toBe('vimeo')
    expect(detectMediaFromURL('https://player.vimeo.com/video/123456')).toBe(
      'vimeo',
    )
  })

  it('should fall back to the file extension', () => {
    expect(detectMediaFromURL('https://vimeo.com/about')).toBeNull()
    expect(detectMediaFromURL('https://cdn.test/poster.png')).toBe('image')
    expect(detectMediaFromURL('')).toBeNull()
  })
})
