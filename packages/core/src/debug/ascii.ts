import type { Pattern } from '../pattern/Pattern'

export interface AsciiOptions {
  /** Character for an active step. Default: 'x' */
  onChar?: string
  /** Character for an inactive step. Default: '-' */
  offChar?: string
  /** Step to mark with '^' on an extra line */
  cursor?: number
}

/**
 * Render a pattern as one text row per voice, groups split by '|'.
 *
 * ```
 * kick  |x---x---x---x---|
 * snare |----x-----------|
 * ```
 */
export function renderPatternAscii<V extends string>(
  pattern: Pattern<V>,
  options: AsciiOptions = {}
): string {
  const { onChar = 'x', offChar = '-', cursor } = options
  const voices = pattern.voices.voices
  const nameWidth = Math.max(0, ...voices.map(v => v.length))

  const lines = voices.map(voice => {
    const cells = pattern.stepsFor(voice).map(on => (on ? onChar : offChar))
    return `${voice.padEnd(nameWidth)} ${joinGroups(cells, pattern.groupSize)}`
  })

  if (cursor !== undefined && cursor >= 0 && cursor < pattern.totalSteps) {
    const marks = Array.from({ length: pattern.totalSteps }, (_, step) => (step === cursor ? '^' : ' '))
    lines.push(`${''.padEnd(nameWidth)} ${joinGroups(marks, pattern.groupSize, ' ')}`.trimEnd())
  }

  return lines.join('\n')
}

function joinGroups(cells: string[], groupSize: number, separator: string = '|'): string {
  const groups: string[] = []
  for (let i = 0; i < cells.length; i += groupSize) {
    groups.push(cells.slice(i, i + groupSize).join(''))
  }
  return `${separator}${groups.join(separator)}${separator}`
}
