import { render, screen, waitFor } from '@testing-library/react'
import { useState } from 'react'
import { describe, expect, it, vi } from 'vitest'

import type { HandlerConfig } from '~/core/types'
import { useSettingsChange } from '~/hooks/use-settings-change'
import { createMemorySource, type MemorySource } from '~/testing'
import type { ConvertedOptions, MappingSpec } from '~/types'

import { flush } from '../helpers'

const SPEC: MappingSpec = {
  speed: { condition: 'autoplay', value: 'autoplay_speed' },
}

const Slider = ({ config }: { config: HandlerConfig }) => {
  const [speed, setSpeed] = useState<unknown>(null)
  useSettingsChange(SPEC, (options) => setSpeed(options['speed']), config)
  return <div data-testid="slider">{String(speed)}</div>
}

const Probe = ({
  source,
  onOptions,
}: {
  source: MemorySource
  onOptions: (options: ConvertedOptions) => void
}) => {
  const [config] = useState<HandlerConfig>(() => ({ source }))
  useSettingsChange(SPEC, onOptions, config)
  return null
}

describe('useSettingsChange', () => {
  it('should pass converted options to the callback', async () => {
    const source = createMemorySource()
    const config = { source }

    render(<Slider config={config} />)
    expect(screen.getByTestId('slider')).toHaveTextContent('null')

    source.emitChange({ autoplay: 'yes', autoplay_speed: 300 }, 'autoplay')

    await waitFor(() => {
      expect(screen.getByTestId('slider')).toHaveTextContent('300')
    })
  })

  it('should detach on unmount', () => {
    const source = createMemorySource()
    const config = { source }

    const { unmount } = render(<Slider config={config} />)
    expect(source.listenerCount()).toBe(1)

    unmount()
    expect(source.listenerCount()).toBe(0)
  })

  it('should call the latest callback without re-subscribing', async () => {
    const source = createMemorySource()
    const subscribe = vi.spyOn(source, 'subscribe')
    const first = vi.fn()
    const second = vi.fn()

    const { rerender } = render(<Probe source={source} onOptions={first} />)
    rerender(<Probe source={source} onOptions={second} />)

    source.emitChange({ autoplay: '', autoplay_speed: 300 }, 'autoplay')
    await flush()

    expect(subscribe).toHaveBeenCalledTimes(1)
    expect(first).not.toHaveBeenCalled()
    expect(second).toHaveBeenCalledWith({ speed: false })
  })
})
