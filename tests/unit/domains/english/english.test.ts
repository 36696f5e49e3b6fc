import { describe, expect, it } from 'vitest'
import {
  ConfigurationError,
  InvalidInstructionError,
  UnsupportedInstructionError,
} from '../../../../src/core/errors.ts'
import { translate, translateProtocol } from '../../../../src/domains/english/english.ts'
import { SUPPORTED_OPS } from '../../../../src/domains/english/instructions.ts'

describe('translate', () => {
  it('describes a simple transfer', () => {
    expect(
      translate([{ op: 'transfer', from: 'plate/A1', to: 'plate/B1', volume: '5:microliter' }]),
    ).toEqual(['Transfer 5 microliters from plate/A1 to plate/B1'])
  })

  it('describes every pipette step in order', () => {
    const sentences = translate([
      {
        op: 'pipette',
        groups: [
          {
            transfer: [
              { from: 'src/A1', to: 'dst/A1', volume: '10:microliter' },
              { from: 'src/A2', to: 'dst/A2', volume: '1:microliter' },
            ],
          },
          { mix: [{ well: 'dst/A1', repetitions: 3, volume: '5:microliter' }] },
          { distribute: { from: 'src/B1', to: [{ well: 'dst/B1' }, { well: 'dst/B2' }] } },
          { consolidate: { from: [{ well: 'src/C1' }, { well: 'src/C2' }], to: 'dst/C1' } },
        ],
      },
    ])

    expect(sentences).toEqual([
      'Transfer 10 microliters from src/A1 to dst/A1',
      'Transfer 1 microliter from src/A2 to dst/A2 with the same tip as previous',
      'Mix well A1 of plate dst 3 times with a volume of 5 microliters',
      'Distribute from src/B1 into wells dst/B1, dst/B2',
      'Consolidate wells src/C1, src/C2 into dst/C1',
    ])
  })

  it('summarises a full-plate dispense and a partial one', () => {
    const columns = Array.from({ length: 12 }, (_, column) => ({ column, volume: '50:microliter' }))
    expect(
      translate([
        { op: 'dispense', object: 'plate', reagent: 'water', columns },
        { op: 'dispense', object: 'plate', resource_id: 'rs1', columns: columns.slice(0, 2) },
      ]),
    ).toEqual([
      'Dispense 50 microliters of water to the full plate of plate',
      'Dispense corresponding amounts of resource rs1 to 2 column(s) of plate',
    ])
  })

  it('describes incubation with storage temperature and shaking', () => {
    expect(
      translate([
        { op: 'incubate', object: 'plate', where: 'warm_37', duration: '2:hour', shaking: true },
        { op: 'incubate', object: 'plate', where: 'cold_4', duration: '1:hour' },
      ]),
    ).toEqual([
      'Incubate plate at 37 degrees celsius for 2 hours (shaking)',
      'Incubate plate at 4 degrees celsius for 1 hour',
    ])
  })

  it('describes plate reads', () => {
    expect(
      translate([
        { op: 'absorbance', object: 'plate', wells: ['A1', 'A2'], wavelength: '600:nanometer' },
        {
          op: 'fluorescence',
          object: 'plate',
          wells: ['A1'],
          excitation: '485:nanometer',
          emission: '535:nanometer',
        },
        { op: 'luminescence', object: 'plate', wells: ['A1', 'B1'] },
      ]),
    ).toEqual([
      'Measure absorbance at 600 nanometers for wells A1, A2 of plate plate',
      'Read fluorescence of wells A1 of plate plate at excitation wavelength 485 nanometers and emission wavelength 535 nanometers',
      'Read luminescence of wells A1, B1 of plate plate',
    ])
  })

  it('describes container handling', () => {
    expect(
      translate([
        { op: 'cover', object: 'plate', lid: 'standard' },
        { op: 'uncover', object: 'plate' },
        { op: 'seal', object: 'plate', type: 'ultra-clear' },
        { op: 'unseal', object: 'plate' },
        { op: 'spin', object: 'plate', duration: '1:minute', acceleration: '1000:g' },
        { op: 'thermocycle', object: 'pcr' },
        { op: 'image_plate', object: 'agar' },
      ]),
    ).toEqual([
      'Cover plate with a standard lid',
      'Uncover plate',
      'Seal plate (ultra-clear)',
      'Unseal plate',
      'Spin plate for 1 minute at 1000 gs',
      'Thermocycle pcr',
      'Take an image of agar',
    ])
  })

  it('counts gel bands beyond three', () => {
    const band = (min: number, max: number) => ({ band_size_range: { min_bp: min, max_bp: max } })
    expect(
      translate([
        { op: 'gel_purify', matrix: 'agarose(8,0.8%)', extract: [band(100, 200), band(100, 200)] },
        {
          op: 'gel_purify',
          matrix: 'agarose(8,0.8%)',
          extract: [band(1, 2), band(3, 4), band(5, 6), band(7, 8)],
        },
        { op: 'gel_separate', matrix: 'agarose(96,2.0%)', duration: '15:minute' },
      ]),
    ).toEqual([
      'Perform gel purification on the 0.8% agarose gel with band range(s) 100-200',
      'Perform gel purification on the 0.8% agarose gel with 4 band ranges',
      'Perform gel electrophoresis using a 2.0% agarose gel for 15 minutes',
    ])
  })

  it('describes provisioning per destination well', () => {
    expect(
      translate([
        {
          op: 'provision',
          resource_id: 'rs1',
          to: [
            { well: 'plate/A1', volume: '20:microliter' },
            { well: 'plate/A2', volume: '1:microliter' },
          ],
        },
      ]),
    ).toEqual([
      'Provision 20 microliters of resource with ID rs1 to well A1 of container plate',
      'Provision 1 microliter of resource with ID rs1 to well A2 of container plate',
    ])
  })

  it('groups sequencing lanes by plate', () => {
    expect(
      translate([
        {
          op: 'illumina_sequence',
          lanes: [{ object: 'lib/A1' }, { object: 'lib/A2' }],
          library_size: 250,
        },
        {
          op: 'sanger_sequence',
          object: 'seq',
          wells: ['A1'],
          type: 'rca',
          primer: 'primers/A1',
        },
      ]),
    ).toEqual([
      'Illumina sequence wells lib/A1, lib/A2 with library size 250',
      'Sanger sequence wells A1 of plate seq with primers',
    ])
  })

  it('describes magnetic transfer steps', () => {
    expect(
      translate([
        {
          op: 'magnetic_transfer',
          groups: [
            [
              { dry: { object: 'beads', duration: '5:minute' } },
              { collect: { object: 'beads', cycles: 3, pause_duration: '10:second' } },
            ],
          ],
        },
      ]),
    ).toEqual([
      'Magnetically dry beads for 5 minutes',
      'Magnetically collect beads beads for 3 cycles with a pause duration of 10 seconds',
    ])
  })

  it('fails on an unsupported instruction', () => {
    const error = (() => {
      try {
        translate([
          { op: 'transfer', from: 'a/A1', to: 'a/A2', volume: '1:microliter' },
          { op: 'unknown' },
        ])
      } catch (caught) {
        return caught
      }
      return undefined
    })()

    expect(error).toBeInstanceOf(UnsupportedInstructionError)
    expect(error).toMatchObject({ index: 1, op: 'unknown' })
  })

  it('fails on a malformed known instruction', () => {
    expect(() => translate([{ op: 'transfer', from: 'a/A1', to: 'a/A2', volume: 'lots' }])).toThrow(
      new InvalidInstructionError(0, 'transfer', 'volume: expected "<value>:<unit>"'),
    )
    expect(() => translate([{ volume: '1:microliter' }])).toThrow(
      "Malformed 'unknown' instruction at step 1: missing \"op\"",
    )
  })

  it('supports thirty instruction kinds', () => {
    expect(SUPPORTED_OPS.size).toBe(30)
  })
})

describe('translateProtocol', () => {
  it('reads the instructions list of a document', () => {
    expect(translateProtocol({ refs: {}, instructions: [{ op: 'uncover', object: 'p' }] })).toEqual([
      'Uncover p',
    ])
  })

  it('rejects documents without instructions', () => {
    expect(() => translateProtocol({ refs: {} })).toThrow(ConfigurationError)
  })
})
