/**
 * Joins rendered lines the way `render` does, one `\n` after each.
 */
export function lines(...rows: string[]): string {
  return rows.map(row => `${row}\n`).join('')
}

export const ports = [
  ['rapportd', '449', 'devuser', '*:61165'],
  ['Python', '22396', 'devuser', '*:8000'],
  ['foo', '108', 'root', '*:1337'],
  ['rustrover', '30928', 'devuser', '127.0.0.1:63342'],
  ['Transmiss', '94671', 'devuser', '*:51413'],
  ['Transmiss', '94671', 'devuser', '*:51413'],
]

export const portHeaders = ['COMMAND', 'PID', 'USER', 'HOST:PORTS']

export const numbered = [
  ['1.', '---', '---'],
  ['2.', '---', '---'],
  ['3.', '------------', '------------'],
  ['4.', '------------', '------------'],
  ['5.', '---', '---'],
  ['6.', '---', '---'],
  ['7.', '---', '---'],
]
