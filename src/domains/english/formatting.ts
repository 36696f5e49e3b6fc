/** Units pluralised with a trailing `s` when the value is above one. */
const PLURAL_UNITS: ReadonlySet<string> = new Set([
  'microliter',
  'nanoliter',
  'milliliter',
  'second',
  'minute',
  'hour',
  'g',
  'nanometer',
])

export const STORAGE_CONDITIONS = [
  'cold_80',
  'cold_20',
  'cold_4',
  'ambient',
  'warm_30',
  'warm_37',
] as const

export type TStorageCondition = (typeof STORAGE_CONDITIONS)[number]

export const TEMPERATURES: Readonly<Record<TStorageCondition, string>> = {
  cold_80: '-80 degrees celsius',
  cold_20: '-20 degrees celsius',
  cold_4: '4 degrees celsius',
  ambient: 'room temperature',
  warm_30: '30 degrees celsius',
  warm_37: '37 degrees celsius',
}

/** `"2:microliter"` → `"2 microliters"`. */
export function unit(quantity: string): string {
  const separator = quantity.indexOf(':')
  const value = quantity.slice(0, separator)
  const name = quantity.slice(separator + 1)
  const plural = Number(value) > 1 && PLURAL_UNITS.has(name)
  return `${value} ${plural ? `${name}s` : name}`
}

export function temperature(condition: TStorageCondition): string {
  return TEMPERATURES[condition]
}

/** Container part of a `container/well` reference. */
export function plateName(ref: string): string {
  return ref.split('/')[0]
}

/** Well part of a `container/well` reference. */
export function wellName(ref: string): string {
  const slash = ref.indexOf('/')
  return slash === -1 ? ref : ref.slice(slash + 1)
}

export function wellList(wells: readonly (string | number)[], maximumListed = 10): string {
  if (wells.length > maximumListed) return `${wells.length} wells`
  return `wells ${wells.join(', ')}`
}

export function unique<T>(values: readonly T[]): T[] {
  return [...new Set(values)]
}

/** Agarose percentage from a matrix id such as `agarose(96,2.0%)`. */
export function gelPercentage(matrix: string): string {
  const parts = matrix.split(',')
  return parts.length < 2 ? matrix : parts[1].replace(/\)$/, '')
}
