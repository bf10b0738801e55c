/**
 * Media type detection from URLs
 */

export type FileMediaType = 'image' | 'video' | 'audio'
export type MediaType = FileMediaType | 'youtube' | 'vimeo' | null

const IMAGE_PATTERN =
  /\.(jpg|jpeg|jfif|pjpeg|pjp|bmp|gif|png|apng|webp|svg|avif|heic|heif|tiff|tif)$/i
const VIDEO_PATTERN = /\.(mp4|ogv|webm|mov|avi|mkv|m4v|wmv|flv)$/i
const AUDIO_PATTERN = /\.(mp3|wav|ogg|m4a|aac|wma|flac)$/i

const YOUTUBE_PATTERN =
  /^((?:https?:)?\/\/)?((?:www|m)\.)?((?:youtube(?:-nocookie)?\.com|youtu\.be))(\/(?:[\w-]+\?v=|embed\/|v\/)?)([\w-]+)(\S+)?$/i
const VIMEO_PATTERN =
  /^((?:https?:)?\/\/)?(?:(?:www|player)\.)?vimeo\.com\/(?:(?:channels\/[A-Za-z]+\/)|(?:groups\/[A-Za-z]+\/videos\/)|(?:video\/))?(\d+)/i

/** Path part of a URL; relative and malformed URLs lose query and fragment by hand */
const toPathname = (url: string): string => {
  try {
    return new URL(url).pathname
  } catch {
    return url.split('?')[0]?.split('#')[0] || url
  }
}

/**
 * Media type from the file extension. Query strings and fragments are ignored.
 *
 * @example
 * ```typescript
 * getMediaType('https://cdn.test/photo.webp?w=800') // 'image'
 * getMediaType('/uploads/clip.mov#t=10')            // 'video'
 * getMediaType('notes.txt')                         // null
 * ```
 */
export const getMediaType = (url: string): FileMediaType | null => {
  if (!url) return null

  const pathname = toPathname(url)

  if (IMAGE_PATTERN.test(pathname)) return 'image'
  if (VIDEO_PATTERN.test(pathname)) return 'video'
  if (AUDIO_PATTERN.test(pathname)) return 'audio'

  return null
}

/** Like {@link getMediaType}, but YouTube and Vimeo links are recognized first */
export const detectMediaFromURL = (url: string): MediaType => {
  if (!url) return null

  if (YOUTUBE_PATTERN.test(url)) return 'youtube'
  if (VIMEO_PATTERN.test(url)) return 'vimeo'

  return getMediaType(url)
}
