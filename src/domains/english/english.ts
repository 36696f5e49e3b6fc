import { ConfigurationError } from '../../core/errors.ts'
import { isRecord } from '../../core/utils.ts'
import {
  gelPercentage,
  plateName,
  temperature,
  unique,
  unit,
  wellList,
  wellName,
} from './formatting.ts'
import {
  parseInstructions,
  type TInstruction,
  type TMagneticStep,
  type TPipetteGroup,
} from './instructions.ts'

const FULL_PLATE_COLUMNS = 12

/**
 * Summarizes Autoprotocol instructions as English sentences, one or more per
 * instruction. Nothing is skipped: a single unsupported or malformed step
 * fails the whole summary.
 */
export function translate(raw: readonly unknown[]): string[] {
  return parseInstructions(raw).flatMap(describe)
}

/** Translates the `instructions` list of a full Autoprotocol document. */
export function translateProtocol(protocol: unknown): string[] {
  if (!isRecord(protocol) || !Array.isArray(protocol.instructions)) {
    throw new ConfigurationError('Autoprotocol document has no "instructions" list')
  }
  return translate(protocol.instructions)
}

export function describe(instruction: TInstruction): string[] {
  switch (instruction.op) {
    case 'transfer':
      return [`Transfer ${unit(instruction.volume)} from ${instruction.from} to ${instruction.to}`]

    case 'pipette':
      return instruction.groups.flatMap(describePipetteGroup)

    case 'dispense': {
      const reagent = instruction.reagent ?? `resource ${instruction.resource_id ?? 'unknown'}`
      const volumes = unique(instruction.columns.map((column) => unit(column.volume)))
      if (instruction.columns.length === FULL_PLATE_COLUMNS && volumes.length === 1) {
        return [`Dispense ${volumes[0]} of ${reagent} to the full plate of ${instruction.object}`]
      }
      return [
        `Dispense corresponding amounts of ${reagent} to ${instruction.columns.length} column(s) of ${instruction.object}`,
      ]
    }

    case 'incubate':
      return [
        `Incubate ${instruction.object} at ${temperature(instruction.where)} for ${unit(instruction.duration)}${instruction.shaking ? ' (shaking)' : ''}`,
      ]

    case 'absorbance':
      return [
        `Measure absorbance at ${unit(instruction.wavelength)} for ${wellList(instruction.wells)} of plate ${instruction.object}`,
      ]

    case 'fluorescence':
      return [
        `Read fluorescence of ${wellList(instruction.wells)} of plate ${instruction.object} at excitation wavelength ${unit(instruction.excitation)} and emission wavelength ${unit(instruction.emission)}`,
      ]

    case 'luminescence':
      return [`Read luminescence of ${wellList(instruction.wells)} of plate ${instruction.object}`]

    case 'acoustic_transfer':
      return instruction.groups.flatMap((group) =>
        group.transfer.map(
          (move) => `Acoustic transfer ${unit(move.volume)} from ${move.from} to ${move.to}`,
        ),
      )

    case 'autopick':
      return instruction.groups.map((group, index) => {
        const source = group.from.length === 1 ? 'well' : 'wells'
        const data =
          index === 0 ? `data saved at '${instruction.dataref}'` : 'analyzed with previous'
        return `Pick ${group.to.length} colonies from ${group.from.length} ${source}: ${wellList(group.from)} to ${wellList(group.to)}, ${data}`
      })

    case 'cover':
      return [`Cover ${instruction.object} with a ${instruction.lid} lid`]

    case 'uncover':
      return [`Uncover ${instruction.object}`]

    case 'seal':
      return [`Seal ${instruction.object} (${instruction.type})`]

    case 'unseal':
      return [`Unseal ${instruction.object}`]

    case 'flash_freeze':
      return [`Flash freeze ${instruction.object} for ${unit(instruction.duration)}`]

    case 'gel_separate':
      return [
        `Perform gel electrophoresis using a ${gelPercentage(instruction.matrix)} agarose gel for ${unit(instruction.duration)}`,
      ]

    case 'gel_purify': {
      const bands = unique(
        instruction.extract.map(
          (extract) => `${extract.band_size_range.min_bp}-${extract.band_size_range.max_bp}`,
        ),
      )
      const percentage = gelPercentage(instruction.matrix)
      if (bands.length <= 3) {
        return [
          `Perform gel purification on the ${percentage} agarose gel with band range(s) ${bands.join(', ')}`,
        ]
      }
      return [
        `Perform gel purification on the ${percentage} agarose gel with ${bands.length} band ranges`,
      ]
    }

    case 'image_plate':
      return [`Take an image of ${instruction.object}`]

    case 'oligosynthesize':
      return instruction.oligos.map(
        (oligo) => `Oligosynthesize sequence '${oligo.sequence}' into '${oligo.destination}'`,
      )

    case 'provision':
      return instruction.to.map(
        (target) =>
          `Provision ${unit(target.volume)} of resource with ID ${instruction.resource_id} to well ${wellName(target.well)} of container ${plateName(target.well)}`,
      )

    case 'sanger_sequence': {
      const sequence = `Sanger sequence ${wellList(instruction.wells)} of plate ${instruction.object}`
      if (instruction.type === 'rca' && instruction.primer) {
        return [`${sequence} with ${plateName(instruction.primer)}`]
      }
      return [sequence]
    }

    case 'illumina_sequence': {
      const wells = unique(instruction.lanes.map((lane) => lane.object))
      const plates = unique(wells.map(plateName))
      let sequence: string
      if (plates.length === 1 && wells.length <= 3) {
        sequence = `Illumina sequence wells ${wells.join(', ')}`
      } else if (plates.length === 1) {
        sequence = `Illumina sequence ${wells.length} wells of plate ${plates[0]}`
      } else if (plates.length <= 3) {
        sequence = `Illumina sequence the corresponding wells of plates ${plates.join(', ')}`
      } else {
        sequence = `Illumina sequence the corresponding wells of ${plates.length} plates`
      }
      return [`${sequence} with library size ${instruction.library_size}`]
    }

    case 'flow_analyze': {
      const wells = unique(instruction.samples.map((sample) => sample.well))
      return [
        `Perform flow cytometry on ${wells.join(', ')} with the respective FSC and SSC channel parameters`,
      ]
    }

    case 'spin':
      return [
        `Spin ${instruction.object} for ${unit(instruction.duration)} at ${unit(instruction.acceleration)}`,
      ]

    case 'spread':
      return [
        `Spread ${unit(instruction.volume)} of bacteria from well ${wellName(instruction.from)} of ${plateName(instruction.from)} to well ${wellName(instruction.to)} of agar plate ${plateName(instruction.to)}`,
      ]

    case 'stamp':
      return instruction.groups.flatMap((group) =>
        group.transfer.map((move, index) => {
          const tips =
            group.transfer.length > 1 && index > 0
              ? ' with the same set of tips as previous'
              : ''
          return `Stamp ${unit(move.volume)} from source origin ${move.from} to destination origin ${move.to}${tips} (${group.shape.rows} rows x ${group.shape.columns} columns)`
        }),
      )

    case 'thermocycle':
      return [`Thermocycle ${instruction.object}`]

    case 'magnetic_transfer':
      return instruction.groups.flatMap((group) => group.map(describeMagneticStep))

    case 'measure_volume': {
      const plates = unique(instruction.object.map(plateName))
      const source = plates.length <= 3 ? plates.join(', ') : `the ${plates.length} plates`
      return [`Measure volume of ${instruction.object.length} wells from ${source}`]
    }

    case 'measure_mass':
      return [`Measure mass of ${instruction.object.join(', ')}`]

    case 'measure_concentration':
      return [
        `Measure concentration of ${unit(instruction.volume)} ${instruction.measurement} source aliquots`,
      ]
  }
}

function describePipetteGroup(group: TPipetteGroup): string[] {
  const sentences: string[] = []
  const transfers = group.transfer ?? []
  transfers.forEach((move, index) => {
    const tip = transfers.length > 1 && index > 0 ? ' with the same tip as previous' : ''
    sentences.push(`Transfer ${unit(move.volume)} from ${move.from} to ${move.to}${tip}`)
  })
  for (const mix of group.mix ?? []) {
    sentences.push(
      `Mix well ${wellName(mix.well)} of plate ${plateName(mix.well)} ${mix.repetitions} times with a volume of ${unit(mix.volume)}`,
    )
  }
  if (group.distribute) {
    const targets = group.distribute.to.map((target) => target.well)
    sentences.push(`Distribute from ${group.distribute.from} into ${wellList(targets, 20)}`)
  }
  if (group.consolidate) {
    const sources = group.consolidate.from.map((source) => source.well)
    sentences.push(`Consolidate ${wellList(sources, 20)} into ${group.consolidate.to}`)
  }
  return sentences
}

function describeMagneticStep(step: TMagneticStep): string {
  if ('dry' in step) {
    return `Magnetically dry ${step.dry.object} for ${unit(step.dry.duration)}`
  }
  if ('incubate' in step) {
    return `Magnetically incubate ${step.incubate.object} for ${unit(step.incubate.duration)} with a tip position of ${step.incubate.tip_position}`
  }
  if ('collect' in step) {
    return `Magnetically collect ${step.collect.object} beads for ${step.collect.cycles} cycles with a pause duration of ${unit(step.collect.pause_duration)}`
  }
  if ('release' in step) {
    return `Magnetically release ${step.release.object} beads for ${unit(step.release.duration)} at an amplitude of ${step.release.amplitude}`
  }
  return `Magnetically mix ${step.mix.object} beads for ${unit(step.mix.duration)} at an amplitude of ${step.mix.amplitude}`
}
