#!/usr/bin/env node
/**
 * callmeter executable
 */

import chalk from 'chalk'
import { getErrorMessage } from '@callmeter/core'
import { createProgram } from './index.js'

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(chalk.red('callmeter:'), getErrorMessage(error))
    process.exitCode = 1
  })
