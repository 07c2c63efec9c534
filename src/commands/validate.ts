/**
 * stepwright validate command
 * Validate workflow files
 */

import type { Command } from 'commander';
import type { Definition } from '../parser/schema.ts';
import { validate } from '../parser/validate.ts';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { collectWorkflowFiles, errorMessage, formatFinding } from './utils.ts';

export interface ValidateOptions {
  /** Security warnings fail the file too */
  strict?: boolean;
}

function validateFile(file: string, options: ValidateOptions, logger: Logger): boolean {
  let definition: Definition;
  try {
    definition = WorkflowParser.loadWorkflow(file);
  } catch (error) {
    logger.error(`  ✗ ${file}`);
    logger.error(`      ${errorMessage(error).split('\n').join('\n      ')}`);
    return false;
  }

  const { errors, security } = validate(definition);
  const failed =
    errors.length > 0 ||
    security.errors.length > 0 ||
    (options.strict === true && security.warnings.length > 0);

  if (failed) {
    logger.error(`  ✗ ${file}`);
  } else {
    logger.log(`  ✓ ${file.padEnd(40)} ${definition.name} (${definition.steps.length} steps)`);
  }

  for (const error of errors) {
    logger.error(`      - ${error.toString()}`);
  }
  for (const finding of security.errors) {
    logger.error(`      ✗ ${formatFinding(finding)}`);
  }
  for (const finding of security.warnings) {
    logger.warn(`      ⚠️  ${formatFinding(finding)}`);
  }

  return !failed;
}

/**
 * Validate every workflow file under `paths` and return the process exit code.
 */
export async function validateWorkflows(
  paths: string[],
  options: ValidateOptions = {},
  logger: Logger = new ConsoleLogger()
): Promise<number> {
  const { files, missing } = await collectWorkflowFiles(paths);
  for (const path of missing) {
    logger.error(`✗ Path not found: ${path}`);
  }

  if (files.length === 0) {
    logger.log('⊘ No workflow files found to validate.');
    return missing.length > 0 ? 1 : 0;
  }

  logger.log(`🔍 Validating ${files.length} workflow(s)...\n`);

  let passed = 0;
  let failed = 0;
  for (const file of files) {
    if (validateFile(file, options, logger)) {
      passed++;
    } else {
      failed++;
    }
  }

  logger.log(`\nSummary: ${passed} passed, ${failed} failed.`);
  return failed > 0 || missing.length > 0 ? 1 : 0;
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate workflow files')
    .argument('[paths...]', 'Workflow files or directories (default: .stepwright/workflows/)')
    .option('--strict', 'Treat security warnings as failures')
    .action(async (paths: string[], options: ValidateOptions) => {
      process.exitCode = await validateWorkflows(paths, options);
    });
}
