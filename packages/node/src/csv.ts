/**
 * @loopsheet/node - CSV Parsing
 *
 * Comma separated text to a grid of strings. Handles quoted fields,
 * doubled quotes inside them, and LF / CRLF / CR line endings.
 */

const QUOTE = '"'

/**
 * Parse CSV text into rows of fields.
 *
 * A trailing line break does not produce an extra row; blank lines in the
 * middle of the text become rows with a single empty field.
 *
 * @example
 * ```typescript
 * parseCsv('pitch,loop\n60,"1.5"\n')  // [['pitch', 'loop'], ['60', '1.5']]
 * ```
 */
export function parseCsv(text: string, delimiter: string = ','): string[][] {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text
  const rows: string[][] = []

  let row: string[] = []
  let field = ''
  let inQuotes = false
  let line = 1
  let quoteLine = 0
  let i = 0

  while (i < input.length) {
    const ch = input[i]

    if (inQuotes) {
      if (ch === QUOTE) {
        if (input[i + 1] === QUOTE) {
          field += QUOTE
          i += 2
        } else {
          inQuotes = false
          i++
        }
        continue
      }
      if (ch === '\n') line++
      field += ch
      i++
      continue
    }

    if (ch === QUOTE) {
      inQuotes = true
      quoteLine = line
      i++
    } else if (ch === delimiter) {
      row.push(field)
      field = ''
      i++
    } else if (ch === '\r' || ch === '\n') {
      row.push(field)
      rows.push(row)
      row = []
      field = ''
      line++
      i += ch === '\r' && input[i + 1] === '\n' ? 2 : 1
    } else {
      field += ch
      i++
    }
  }

  if (inQuotes) {
    throw new Error(`Unterminated quoted field starting on line ${quoteLine}`)
  }

  if (field !== '' || row.length > 0) {
    row.push(field)
    rows.push(row)
  }

  return rows
}
