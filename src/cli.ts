#!/usr/bin/env node

import chalk from 'chalk'
import { createProgram } from './program'

createProgram()
  .parseAsync(process.argv)
  .catch((error: Error) => {
    console.error(chalk.red.bold('\n❌ エラー'))
    console.error(chalk.red(error.message))
    process.exit(1)
  })
