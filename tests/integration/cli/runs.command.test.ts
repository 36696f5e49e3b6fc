import { promises as fs } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { defaultRunTitle } from '../../../src/cli/commands/runs.ts'
import { runTestCli } from '../../helpers/cli.ts'
import { createFetchMock } from '../../helpers/mocks/fetch.mock.ts'

const PROTOCOL = { refs: { plate: {} }, instructions: [{ op: 'uncover', object: 'plate' }] }

describe('run commands', () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(join(tmpdir(), 'transcriptic-runs-'))
    await fs.writeFile(join(cwd, 'protocol.json'), JSON.stringify(PROTOCOL))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  describe('analyze', () => {
    it('prints counts and the quote', async () => {
      const fetchMock = createFetchMock()
      fetchMock.pushJson({
        instructions: [{}, {}],
        refs: { plate: {} },
        warnings: [],
        quote: { items: [{ title: 'Run', cost: '5.00' }] },
        total_cost: '5.00',
      })

      const { exitCode, out } = await runTestCli(['analyze', 'protocol.json', '--test'], {
        cwd,
        fetchMock,
      })

      expect(exitCode).toBe(0)
      expect(fetchMock.jsonBody(0)).toEqual({ protocol: PROTOCOL, test_mode: true })
      expect(out).toEqual([
        '✓ Protocol analyzed',
        '  2 instructions',
        '  1 container',
        '  Run: $5.00',
        '-'.repeat(24),
        '  Total Cost: $5.00',
      ])
    })

    it('prints the service messages for a rejected protocol', async () => {
      const fetchMock = createFetchMock()
      fetchMock.pushJson({ protocol: [{ message: 'Plate is not sealed' }] }, { status: 422 })

      const { exitCode, err } = await runTestCli(['analyze', 'protocol.json'], { cwd, fetchMock })

      expect(exitCode).toBe(1)
      expect(err).toEqual(['Error: Error in protocol:\n- Plate is not sealed'])
    })
  })

  describe('submit', () => {
    it('submits to the named project and prints the run URL', async () => {
      const fetchMock = createFetchMock()
      fetchMock.pushJson({ projects: [{ id: 'p1abc', name: 'Growth' }] })
      fetchMock.pushJson({ id: 'r1xyz' }, { status: 201 })

      const { exitCode, out } = await runTestCli(
        ['submit', 'protocol.json', '-p', 'Growth', '-t', 'First run'],
        { cwd, fetchMock },
      )

      expect(exitCode).toBe(0)
      expect(fetchMock.jsonBody(1)).toEqual({
        title: 'First run',
        protocol: PROTOCOL,
        test_mode: false,
      })
      expect(out).toEqual(['Run created: https://api.test.com/test-org/p1abc/runs/r1xyz'])
    })

    it('requires a project', async () => {
      const { exitCode, err } = await runTestCli(['submit', 'protocol.json'], { cwd })

      expect(exitCode).toBe(1)
      expect(err[0]).toBe("error: required option '-p, --project <project>' not specified")
    })

    it('refuses an invalid payment method before submitting', async () => {
      const fetchMock = createFetchMock()
      fetchMock.pushJson([{ id: 'pm1', type: 'CreditCard', is_valid: false }])

      const { exitCode, err } = await runTestCli(
        ['submit', 'protocol.json', '-p', 'Growth', '--payment', 'pm1'],
        { cwd, fetchMock },
      )

      expect(exitCode).toBe(1)
      expect(err[0]).toMatch(/^Error: Payment method is invalid\./)
      expect(fetchMock.calls).toHaveLength(1)
    })
  })
})

describe('defaultRunTitle', () => {
  it('formats the UTC date after the protocol name', () => {
    expect(defaultRunTitle('Growth', new Date('2026-10-08T23:30:00Z'))).toBe('Growth_Oct_08_2026')
  })
})
