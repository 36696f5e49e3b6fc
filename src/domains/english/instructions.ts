import { z } from 'zod'
import { InvalidInstructionError, UnsupportedInstructionError } from '../../core/errors.ts'
import { isRecord } from '../../core/utils.ts'
import { STORAGE_CONDITIONS } from './formatting.ts'

/** `"<value>:<unit>"`, e.g. `"10:microliter"`. */
const Unit = z.string().regex(/^-?\d+(?:\.\d+)?:\S+$/, 'expected "<value>:<unit>"')
const Ref = z.string().min(1)
const Wells = z.array(Ref)

const Move = z.object({ from: Ref, to: Ref, volume: Unit })

const Transfer = z.object({ op: z.literal('transfer') }).merge(Move)

const PipetteGroup = z
  .object({
    transfer: z.array(Move).optional(),
    mix: z
      .array(z.object({ well: Ref, repetitions: z.number().int(), volume: Unit }))
      .optional(),
    distribute: z
      .object({ from: Ref, to: z.array(z.object({ well: Ref, volume: Unit.optional() })) })
      .optional(),
    consolidate: z
      .object({ from: z.array(z.object({ well: Ref, volume: Unit.optional() })), to: Ref })
      .optional(),
  })
  .refine(
    (group) => group.transfer || group.mix || group.distribute || group.consolidate,
    'pipette group needs one of transfer, mix, distribute or consolidate',
  )

const Pipette = z.object({ op: z.literal('pipette'), groups: z.array(PipetteGroup) })

const Dispense = z.object({
  op: z.literal('dispense'),
  object: Ref,
  reagent: z.string().optional(),
  resource_id: z.string().optional(),
  columns: z.array(z.object({ column: z.number().int(), volume: Unit })).min(1),
})

const Incubate = z.object({
  op: z.literal('incubate'),
  object: Ref,
  where: z.enum(STORAGE_CONDITIONS),
  duration: Unit,
  shaking: z.boolean().default(false),
})

const Absorbance = z.object({
  op: z.literal('absorbance'),
  object: Ref,
  wells: Wells,
  wavelength: Unit,
})

const Fluorescence = z.object({
  op: z.literal('fluorescence'),
  object: Ref,
  wells: Wells,
  excitation: Unit,
  emission: Unit,
})

const Luminescence = z.object({ op: z.literal('luminescence'), object: Ref, wells: Wells })

const AcousticTransfer = z.object({
  op: z.literal('acoustic_transfer'),
  groups: z.array(z.object({ transfer: z.array(Move) })).min(1),
})

const Autopick = z.object({
  op: z.literal('autopick'),
  groups: z.array(z.object({ from: Wells.min(1), to: Wells })).min(1),
  dataref: z.string(),
})

const Cover = z.object({ op: z.literal('cover'), object: Ref, lid: z.string() })
const Uncover = z.object({ op: z.literal('uncover'), object: Ref })
const Seal = z.object({ op: z.literal('seal'), object: Ref, type: z.string() })
const Unseal = z.object({ op: z.literal('unseal'), object: Ref })

const FlashFreeze = z.object({ op: z.literal('flash_freeze'), object: Ref, duration: Unit })

const GelSeparate = z.object({ op: z.literal('gel_separate'), matrix: z.string(), duration: Unit })

const GelPurify = z.object({
  op: z.literal('gel_purify'),
  matrix: z.string(),
  extract: z
    .array(
      z.object({
        band_size_range: z.object({ min_bp: z.number(), max_bp: z.number() }),
      }),
    )
    .min(1),
})

const ImagePlate = z.object({ op: z.literal('image_plate'), object: Ref })

const Oligosynthesize = z.object({
  op: z.literal('oligosynthesize'),
  oligos: z.array(z.object({ sequence: z.string(), destination: Ref })),
})

const Provision = z.object({
  op: z.literal('provision'),
  resource_id: z.string(),
  to: z.array(z.object({ well: Ref, volume: Unit })),
})

const SangerSequence = z.object({
  op: z.literal('sanger_sequence'),
  object: Ref,
  wells: Wells,
  type: z.enum(['standard', 'rca']),
  primer: Ref.optional(),
})

const IlluminaSequence = z.object({
  op: z.literal('illumina_sequence'),
  lanes: z.array(z.object({ object: Ref })).min(1),
  library_size: z.number(),
})

const FlowAnalyze = z.object({
  op: z.literal('flow_analyze'),
  samples: z.array(z.object({ well: Ref })).min(1),
})

const Spin = z.object({
  op: z.literal('spin'),
  object: Ref,
  duration: Unit,
  acceleration: Unit,
})

const Spread = z.object({ op: z.literal('spread'), from: Ref, to: Ref, volume: Unit })

const Stamp = z.object({
  op: z.literal('stamp'),
  groups: z.array(
    z.object({
      transfer: z.array(Move),
      shape: z.object({ rows: z.number().int(), columns: z.number().int() }),
    }),
  ),
})

const Thermocycle = z.object({ op: z.literal('thermocycle'), object: Ref })

const MagneticStep = z.union([
  z.object({ dry: z.object({ object: Ref, duration: Unit }) }),
  z.object({
    incubate: z.object({ object: Ref, duration: Unit, tip_position: z.number() }),
  }),
  z.object({
    collect: z.object({ object: Ref, cycles: z.number().int(), pause_duration: Unit }),
  }),
  z.object({ release: z.object({ object: Ref, duration: Unit, amplitude: z.number() }) }),
  z.object({ mix: z.object({ object: Ref, duration: Unit, amplitude: z.number() }) }),
])

const MagneticTransfer = z.object({
  op: z.literal('magnetic_transfer'),
  groups: z.array(z.array(MagneticStep).min(1)).min(1),
})

const MeasureVolume = z.object({ op: z.literal('measure_volume'), object: Wells.min(1) })
const MeasureMass = z.object({ op: z.literal('measure_mass'), object: Wells.min(1) })
const MeasureConcentration = z.object({
  op: z.literal('measure_concentration'),
  object: Wells,
  volume: Unit,
  measurement: z.string(),
})

export const InstructionSchema = z.discriminatedUnion('op', [
  Transfer,
  Pipette,
  Dispense,
  Incubate,
  Absorbance,
  Fluorescence,
  Luminescence,
  AcousticTransfer,
  Autopick,
  Cover,
  Uncover,
  Seal,
  Unseal,
  FlashFreeze,
  GelSeparate,
  GelPurify,
  ImagePlate,
  Oligosynthesize,
  Provision,
  SangerSequence,
  IlluminaSequence,
  FlowAnalyze,
  Spin,
  Spread,
  Stamp,
  Thermocycle,
  MagneticTransfer,
  MeasureVolume,
  MeasureMass,
  MeasureConcentration,
])

export type TInstruction = z.infer<typeof InstructionSchema>
export type TInstructionOp = TInstruction['op']
export type TPipetteGroup = z.infer<typeof PipetteGroup>
export type TMagneticStep = z.infer<typeof MagneticStep>

export const SUPPORTED_OPS: ReadonlySet<string> = new Set<string>(
  InstructionSchema.options.map((option) => option.shape.op.value),
)

/**
 * Parses raw Autoprotocol instructions. An unknown `op` fails with
 * UnsupportedInstructionError; a known one with bad fields with
 * InvalidInstructionError.
 */
export function parseInstructions(raw: readonly unknown[]): TInstruction[] {
  return raw.map((entry, index) => {
    const op = isRecord(entry) && typeof entry.op === 'string' ? entry.op : undefined
    if (op === undefined) throw new InvalidInstructionError(index, 'unknown', 'missing "op"')
    if (!SUPPORTED_OPS.has(op)) throw new UnsupportedInstructionError(index, op)

    const parsed = InstructionSchema.safeParse(entry)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
      throw new InvalidInstructionError(index, op, `${where}${issue?.message ?? 'invalid'}`)
    }
    return parsed.data
  })
}
