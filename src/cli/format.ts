import type { TAnalysis } from '../types/api.ts'

export function center(text: string, width: number): string {
  if (text.length >= width) return text
  const left = Math.floor((width - text.length) / 2)
  return `${' '.repeat(left)}${text}${' '.repeat(width - text.length - left)}`
}

export function rule(width: number): string {
  return '-'.repeat(width)
}

/** A table row of centered cells joined by `|`. */
export function tableRow(cells: readonly string[], width: number): string {
  return cells.map((cell) => center(cell, width)).join('|')
}

const currency = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' })

export function formatCost(cost: string | number): string {
  return currency.format(Number(cost))
}

/** Quote lines for an analysis; empty when the account may not see prices. */
export function priceLines(analysis: TAnalysis): string[] {
  if (!analysis.quote) return []
  const lines = analysis.quote.items.map((item) => `  ${item.title}: ${formatCost(item.cost)}`)
  const width = Math.max(24, ...lines.map((line) => line.length))
  lines.push(rule(width))
  lines.push(`  Total Cost: ${formatCost(analysis.total_cost ?? 0)}`)
  return lines
}

function count(singular: string, plural: string, value: number): string {
  return `  ${value} ${value === 1 ? singular : plural}`
}

export function analysisLines(analysis: TAnalysis): string[] {
  const lines = [
    count('instruction', 'instructions', analysis.instructions.length),
    count('container', 'containers', Object.keys(analysis.refs).length),
    ...priceLines(analysis),
  ]
  for (const warning of analysis.warnings) {
    const context = warning.context ?? {}
    const where =
      'instruction' in context ? `instruction ${String(context.instruction)}` : JSON.stringify(context)
    lines.push(`WARNING (${where}): ${warning.message}`)
  }
  return lines
}
