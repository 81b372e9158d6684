import chalk from 'chalk'
import ora from 'ora'
import { tryit } from 'radash'
import {
  Alignment,
  Table,
} from '../src'

const { Left, Right } = Alignment

const MAX_ROWS = 5

const spinner = ora({ discardStdin: false })

const ports = [
  ['rapportd', '449', 'devuser', '*:61165'],
  ['Python', '22396', 'devuser', '*:8000'],
  ['foo', '108', 'root', '*:1337'],
  ['rustrover', '30928', 'devuser', '127.0.0.1:63342'],
  ['Transmiss', '94671', 'devuser', '*:51413'],
  ['Transmiss', '94671', 'devuser', '*:51413'],
]

const [error, table] = tryit(() => new Table()
  .headers(['COMMAND', 'PID', 'USER', 'HOST:PORTS'])
  .alignments([Left, Right, Left, Right])
  .data(ports)
  .maxRows(MAX_ROWS)
  .render())()

if (typeof table === 'string') {
  if (ports.length > MAX_ROWS)
    spinner.info(chalk.magentaBright(`Showing ${MAX_ROWS - 1} of ${ports.length} listening processes`))

  process.stdout.write(table)
}
else {
  spinner.fail(chalk.redBright(error?.message))
  process.exitCode = 1
}
