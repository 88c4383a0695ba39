#!/usr/bin/env node
/**
 * Tribunal CLI - Main entry point
 * Provides the `tribunal` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { realpathSync } from 'fs'
import { readFile } from 'fs/promises'
import { z } from 'zod'
import { createLogger } from '../utils/logger.js'
import { registerConfigCommand } from './commands/config.js'
import { registerDecideCommand } from './commands/decide.js'
import { registerJudgeCommand } from './commands/judge.js'
import { registerRunCommand } from './commands/run.js'
import { registerSessionsCommand } from './commands/sessions.js'

const logger = createLogger('cli')

const PackageJsonSchema = z.object({ name: z.string().optional(), version: z.string().optional() })

/** Resolve the package.json path relative to this file */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // Try both levels since this may be run from dist/ or src/
  const paths = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of paths) {
    let content: string
    try {
      content = await readFile(pkgPath, 'utf-8')
    } catch {
      continue
    }
    const pkg = PackageJsonSchema.safeParse(JSON.parse(content))
    if (pkg.success && pkg.data.name === 'tribunal') {
      return pkg.data.version ?? '0.0.0'
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('tribunal')
    .description('Tribunal - multi-evaluator adjudication of candidate statements')
    .version(version, '-v, --version', 'Output the current version')

  registerRunCommand(program, version)
  registerJudgeCommand(program, version)
  registerDecideCommand(program, version)
  registerSessionsCommand(program, version)
  registerConfigCommand(program, version)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Only run when executed directly, not when imported by tests
const entry = process.argv[1]
if (entry !== undefined && realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url))) {
  void main()
}
