/**
 * Vitest test setup
 *
 * Runs before every test file: jest-dom matchers and React cleanup.
 */

import '@testing-library/jest-dom/vitest'

import { cleanup } from '@testing-library/react'
import { afterEach } from 'vitest'

afterEach(() => {
  cleanup()
})
