import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { writeLLMLog } from '../llm-logger'

describe('writeLLMLog', () => {
  let tmp: string

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'llm-log-'))
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('creates the directory and writes pretty JSON', () => {
    const logDir = path.join(tmp, 'nested', 'logs')

    const written = writeLLMLog(logDir, 'analysis', { query: 'How was my run?' })

    expect(written).not.toBeNull()
    expect(path.dirname(written ?? '')).toBe(logDir)
    expect(fs.readFileSync(written ?? '', 'utf8')).toBe('{\n  "query": "How was my run?"\n}')
  })

  it('returns null instead of throwing when the directory cannot be created', () => {
    const blocker = path.join(tmp, 'not-a-dir')
    fs.writeFileSync(blocker, '')

    expect(writeLLMLog(blocker, 'analysis', {})).toBeNull()
    expect(console.error).toHaveBeenCalledTimes(1)
  })
})
