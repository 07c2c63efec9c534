import type { ValidationError } from '../types/errors.ts';
import { DefinitionValidator } from './definition-validator.ts';
import type { Definition } from './schema.ts';
import { type SecurityResult, SecurityValidator } from './security-validator.ts';

export interface ValidationResult {
  /** Structural problems; any entry blocks execution */
  errors: ValidationError[];
  security: SecurityResult;
}

/**
 * Run the structural and the security pass over a definition.
 */
export function validate(definition: Definition): ValidationResult {
  return {
    errors: DefinitionValidator.validate(definition),
    security: SecurityValidator.validate(definition),
  };
}
