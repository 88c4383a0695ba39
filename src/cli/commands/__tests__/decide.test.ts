/**
 * Tests for `tribunal decide`.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { writeFile } from 'fs/promises'
import { join } from 'path'
import { InvalidInputError, InvalidJudgmentError } from '../../../core/errors.js'
import { createJudgment } from '../../../modules/judgment/judgment.js'
import { parseJudgmentsDocument, runDecide } from '../decide.js'
import { captureOutput, createTestDirs, removeTestDirs, writeProjectConfig } from './cli-test-helpers.js'
import type { CapturedOutput, TestDirs } from './cli-test-helpers.js'

let dirs: TestDirs
let output: CapturedOutput

beforeEach(async () => {
  dirs = await createTestDirs('decide-cmd')
  output = captureOutput()
})

afterEach(async () => {
  output.restore()
  await removeTestDirs(dirs)
})

const JUDGMENTS_YAML = [
  'testablePredictions: 2',
  'judgments:',
  '  - evaluatorId: logic',
  '    role: logic-checker',
  '    isLogicallyConsistent: true',
  '    noveltyScore: 0.9',
  '    coherenceScore: 0.8',
  '    identifiedIssues:',
  '      - premise 2 is unstated',
  '  - evaluatorId: critic',
  '    role: critic',
  '    isLogicallyConsistent: true',
  '    noveltyScore: 0.7',
  '    coherenceScore: 0.75',
  '',
].join('\n')

async function writeJudgments(content: string, name = 'judgments.yaml'): Promise<string> {
  const path = join(dirs.testDir, name)
  await writeFile(path, content, 'utf-8')
  return path
}

function decideOptions(judgmentsFile: string): Parameters<typeof runDecide>[0] {
  return {
    judgmentsFile,
    version: '1.2.3',
    projectConfigDir: dirs.projectConfigDir,
    globalConfigDir: dirs.globalConfigDir,
    env: {},
  }
}

describe('runDecide', () => {
  it('prints the judgment table and the decision', async () => {
    const file = await writeJudgments(JUDGMENTS_YAML)

    const exitCode = await runDecide(decideOptions(file))

    expect(exitCode).toBe(0)
    expect(output.getStdout()).toBe(
      [
        'Evaluator | Role          | Consistent | Novelty | Coherence | Issues',
        '----------+---------------+------------+---------+-----------+-------',
        'logic     | logic-checker | yes        | 0.9     | 0.8       | 1',
        'critic    | critic        | yes        | 0.7     | 0.75      | 0',
        '',
        'Outcome: ACCEPT',
        'Average novelty: 0.8 (2 sample(s))',
        'Testable predictions: 2',
        'Coherence agreement: 2/2',
        'Reasons:',
        '  - accepted: novelty 0.8 >= 0.7, testable predictions 2 >= 2, coherence agreement 2/2',
        '',
      ].join('\n'),
    )
  })

  it('lets --predictions override the count in the file', async () => {
    const file = await writeJudgments(JUDGMENTS_YAML)

    await runDecide({ ...decideOptions(file), predictions: 1, outputFormat: 'json' })

    const parsed: unknown = JSON.parse(output.getStdout())
    expect(parsed).toMatchObject({
      command: 'tribunal decide',
      version: '1.2.3',
      data: {
        decision: {
          outcome: 'REVISE',
          reasons: ['insufficient testable predictions: 1 < 2'],
          contributingJudgmentIds: ['logic', 'critic'],
        },
      },
    })
  })

  it('uses consensus thresholds from the project config', async () => {
    await writeProjectConfig(dirs, 'consensus:\n  novelty_threshold: 0.85\n')
    const file = await writeJudgments(JUDGMENTS_YAML)

    await runDecide({ ...decideOptions(file), outputFormat: 'json' })

    expect(JSON.parse(output.getStdout())).toMatchObject({
      data: { decision: { outcome: 'REVISE', reasons: ['novelty 0.8 below threshold 0.85'] } },
    })
  })

  it('accepts a JSON list of judgments with --predictions', async () => {
    const file = await writeJudgments(
      JSON.stringify([{ evaluatorId: 'logic', role: 'logic-checker', isLogicallyConsistent: false }]),
      'judgments.json',
    )

    const exitCode = await runDecide({ ...decideOptions(file), predictions: 3, outputFormat: 'json' })

    expect(exitCode).toBe(0)
    expect(JSON.parse(output.getStdout())).toMatchObject({
      data: { decision: { outcome: 'REJECT', reasons: ['logical inconsistency found by evaluator logic'] } },
    })
  })

  it('fails when no prediction count is given', async () => {
    const file = await writeJudgments(
      JSON.stringify([{ evaluatorId: 'logic', role: 'logic-checker', isLogicallyConsistent: true }]),
    )

    const exitCode = await runDecide(decideOptions(file))

    expect(exitCode).toBe(1)
    expect(output.getStderr()).toBe(
      'Error: Testable prediction count is required: pass --predictions or set testablePredictions in the file\n',
    )
    expect(output.getStdout()).toBe('')
  })

  it('fails on an empty judgment list', async () => {
    const file = await writeJudgments('[]')

    const exitCode = await runDecide({ ...decideOptions(file), predictions: 2 })

    expect(exitCode).toBe(1)
    expect(output.getStderr()).toBe('Error: Cannot decide on an empty judgment set\n')
  })

  it('reports an out-of-range score as an invalid judgment', async () => {
    const file = await writeJudgments(
      JSON.stringify([{ evaluatorId: 'logic', role: 'critic', isLogicallyConsistent: true, coherenceScore: -0.2 }]),
    )

    const exitCode = await runDecide({ ...decideOptions(file), predictions: 2 })

    expect(exitCode).toBe(1)
    expect(output.getStderr()).toBe('Error: Invalid judgment: coherenceScore: must be at least 0.0\n')
  })

  it('fails on a missing file', async () => {
    const exitCode = await runDecide(decideOptions(join(dirs.testDir, 'absent.yaml')))

    expect(exitCode).toBe(1)
    expect(output.getStderr()).toMatch(/^Error: ENOENT/)
  })
})

describe('parseJudgmentsDocument', () => {
  it('reads a bare list', () => {
    expect(
      parseJudgmentsDocument('- evaluatorId: logic\n  role: critic\n  isLogicallyConsistent: true\n'),
    ).toEqual({
      inputs: [
        { evaluatorId: 'logic', role: 'critic', isLogicallyConsistent: true, identifiedIssues: [], reasoning: '' },
      ],
    })
  })

  it('leaves score range checks to judgment construction', () => {
    const { inputs } = parseJudgmentsDocument(
      '- evaluatorId: logic\n  role: critic\n  isLogicallyConsistent: true\n  noveltyScore: 1.5\n',
    )

    expect(inputs[0]?.noveltyScore).toBe(1.5)
    expect(() => inputs.map(createJudgment)).toThrow(InvalidJudgmentError)
    expect(() => inputs.map(createJudgment)).toThrow('Invalid judgment: noveltyScore: must be at most 1.0')
  })

  it('names the offending field of a mistyped score', () => {
    expect(() =>
      parseJudgmentsDocument(
        '- evaluatorId: logic\n  role: critic\n  isLogicallyConsistent: true\n  noveltyScore: high\n',
      ),
    ).toThrow(new InvalidInputError('Invalid judgments file: 0.noveltyScore: Expected number, received string'))
  })

  it('rejects a document that is neither a list nor an object with judgments', () => {
    expect(() => parseJudgmentsDocument('just text')).toThrow(
      'Invalid judgments file: (root): Expected object, received string',
    )
  })
})
