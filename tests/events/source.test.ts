import { describe, expect, it, vi } from 'vitest'

import {
  createEventTargetSource,
  createWindowSource,
  NEVER_SOURCE,
  SETTING_CHANGED_EVENT,
} from '~/events/source'

describe('createEventTargetSource', () => {
  it('should forward events dispatched under its name', () => {
    const target = new EventTarget()
    const source = createEventTargetSource(target, 'custom:changed')
    const listener = vi.fn()

    source.subscribe(listener)
    const event = new CustomEvent('custom:changed', { detail: { a: 1 } })
    target.dispatchEvent(event)
    target.dispatchEvent(new CustomEvent('other'))

    expect(listener).toHaveBeenCalledTimes(1)
    expect(listener).toHaveBeenCalledWith(event)
  })

  it('should remove only the unsubscribed listener', () => {
    const target = new EventTarget()
    const source = createEventTargetSource(target, 'custom:changed')
    const first = vi.fn()
    const second = vi.fn()

    const unsubscribeFirst = source.subscribe(first)
    source.subscribe(second)
    unsubscribeFirst()
    target.dispatchEvent(new CustomEvent('custom:changed'))

    expect(first).not.toHaveBeenCalled()
    expect(second).toHaveBeenCalledTimes(1)
  })

  it('should default to the setting changed event', () => {
    const target = new EventTarget()
    const listener = vi.fn()

    createEventTargetSource(target).subscribe(listener)
    target.dispatchEvent(new CustomEvent(SETTING_CHANGED_EVENT))

    expect(listener).toHaveBeenCalledTimes(1)
  })
})

describe('createWindowSource', () => {
  it('should listen on window', () => {
    const listener = vi.fn()
    const unsubscribe = createWindowSource('window:changed').subscribe(listener)

    window.dispatchEvent(new CustomEvent('window:changed'))
    unsubscribe()
    window.dispatchEvent(new CustomEvent('window:changed'))

    expect(listener).toHaveBeenCalledTimes(1)
  })
})

describe('NEVER_SOURCE', () => {
  it('should hand out a callable unsubscribe', () => {
    const unsubscribe = NEVER_SOURCE.subscribe(vi.fn())

    expect(() => unsubscribe()).not.toThrow()
  })
})
