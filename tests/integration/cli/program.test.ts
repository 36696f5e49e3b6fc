import { describe, expect, it } from 'vitest'
import { SDK_VERSION } from '../../../src/core/sdk-info.ts'
import { runTestCli, sessionEnv } from '../../helpers/cli.ts'
import { createFetchMock } from '../../helpers/mocks/fetch.mock.ts'

describe('transcriptic program', () => {
  it('prints the version and exits with 0', async () => {
    const { exitCode, out } = await runTestCli(['--version'])

    expect(exitCode).toBe(0)
    expect(out).toEqual([SDK_VERSION])
  })

  it('prints help and exits with 0', async () => {
    const { exitCode, out } = await runTestCli(['--help'])

    expect(exitCode).toBe(0)
    expect(out[0]).toMatch(/^Usage: transcriptic \[options\] \[command\]/)
  })

  it('rejects unknown commands with exit code 1', async () => {
    const { exitCode, err } = await runTestCli(['frobnicate'])

    expect(exitCode).toBe(1)
    expect(err[0]).toMatch(/^error: unknown command 'frobnicate'/)
  })

  it('prints errors from commands and exits with 1', async () => {
    const { exitCode, err } = await runTestCli(['projects'], {
      env: sessionEnv({ TRANSCRIPTIC_TOKEN: '' }),
    })

    expect(exitCode).toBe(1)
    expect(err).toEqual([
      'Error: No credentials found. Run `transcriptic login` or set TRANSCRIPTIC_TOKEN.',
    ])
  })

  it('applies the global organization flag', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ projects: [] })

    const { exitCode } = await runTestCli(['-o', 'other', 'projects', '--json'], { fetchMock })

    expect(exitCode).toBe(0)
    expect(fetchMock.calls[0].url).toBe('https://api.test.com/other/?q=&per_page=500')
    expect(fetchMock.calls[0].headers.organization).toBe('other')
  })

  it('prefers the token flag over the environment', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ projects: [] })

    await runTestCli(['--token', 'flag-token', 'projects', '--json'], { fetchMock })

    expect(fetchMock.calls[0].headers.authorization).toBe('Bearer flag-token')
  })
})
