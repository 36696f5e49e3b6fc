import { promises as fs } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { MANIFEST_TEMPLATE } from '../../../src/cli/manifest.ts'
import { runTestCli } from '../../helpers/cli.ts'

describe('local commands', () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(join(tmpdir(), 'transcriptic-cli-'))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  const writeJson = (name: string, value: unknown) =>
    fs.writeFile(join(cwd, name), JSON.stringify(value))

  describe('init', () => {
    it('writes a starter manifest', async () => {
      const { exitCode, out } = await runTestCli(['init', 'lab'], { cwd })

      expect(exitCode).toBe(0)
      expect(out).toEqual(['Creating empty manifest.json...', 'manifest.json created'])
      const written: unknown = JSON.parse(await fs.readFile(join(cwd, 'lab', 'manifest.json'), 'utf8'))
      expect(written).toEqual(MANIFEST_TEMPLATE)
    })

    it('keeps an existing manifest unless overwriting is confirmed', async () => {
      await writeJson('manifest.json', { protocols: [] })

      const { exitCode, out, io } = await runTestCli(['init'], { cwd, confirmations: [false] })

      expect(exitCode).toBe(0)
      expect(io.confirm).toHaveBeenCalledTimes(1)
      expect(out).toEqual([])
      expect(JSON.parse(await fs.readFile(join(cwd, 'manifest.json'), 'utf8'))).toEqual({
        protocols: [],
      })
    })
  })

  describe('format', () => {
    it('accepts a well-formed manifest', async () => {
      await writeJson('manifest.json', MANIFEST_TEMPLATE)

      const { exitCode, out } = await runTestCli(['format'], { cwd })

      expect(exitCode).toBe(0)
      expect(out).toEqual(['No manifest formatting errors found.'])
    })

    it('lists formatting errors with their paths', async () => {
      await writeJson('broken.json', { protocols: [{ name: 'Growth', inputs: {} }] })

      const { exitCode, err } = await runTestCli(['format', 'broken.json'], { cwd })

      expect(exitCode).toBe(1)
      expect(err).toEqual([
        'Error: Formatting errors in broken.json:\nprotocols.0.command_string: Required',
      ])
    })

    it('rejects a manifest without protocols', async () => {
      await writeJson('manifest.json', { format: 'python', protocols: [] })

      const { err } = await runTestCli(['format'], { cwd })

      expect(err).toEqual([
        'Error: Formatting errors in manifest.json:\nprotocols: manifest has no protocols',
      ])
    })
  })

  describe('summarize', () => {
    const protocol = {
      refs: {},
      instructions: [
        { op: 'uncover', object: 'plate' },
        { op: 'seal', object: 'plate', type: 'foil' },
      ],
    }

    it('numbers one sentence per step', async () => {
      await writeJson('protocol.json', protocol)

      const { exitCode, out } = await runTestCli(['summarize', 'protocol.json'], { cwd })

      expect(exitCode).toBe(0)
      expect(out).toEqual(['1. Uncover plate', '2. Seal plate (foil)'])
    })

    it('reads standard input by default', async () => {
      const { out } = await runTestCli(['summarize'], { cwd, stdin: JSON.stringify(protocol) })

      expect(out).toEqual(['1. Uncover plate', '2. Seal plate (foil)'])
    })

    it('fails on an unsupported instruction', async () => {
      await writeJson('protocol.json', { refs: {}, instructions: [{ op: 'teleport' }] })

      const { exitCode, err, out } = await runTestCli(['summarize', 'protocol.json'], { cwd })

      expect(exitCode).toBe(1)
      expect(out).toEqual([])
      expect(err).toEqual(["Error: Unsupported instruction 'teleport' at step 1"])
    })

    it('rejects input that is not JSON', async () => {
      const { err } = await runTestCli(['summarize'], { cwd, stdin: 'not json' })

      expect(err).toEqual(["Error: The Autoprotocol you're trying to read is not valid JSON."])
    })
  })
})
