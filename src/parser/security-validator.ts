import type { ConnectorAuth, Definition, StepDefinition } from './schema.ts';
import { BUILTIN_CONNECTORS } from './workflow-parser.ts';
import { childLists } from './definition-validator.ts';

export type SecurityFindingType =
  | 'shell_injection'
  | 'plaintext_credential'
  | 'overly_permissive_path'
  | 'missing_auth';

export interface SecurityFinding {
  /** Step id, or `connectors.<name>` for connector findings */
  stepId: string;
  type: SecurityFindingType;
  message: string;
  suggestion: string;
  severity: 'warning' | 'error';
}

export interface SecurityResult {
  warnings: SecurityFinding[];
  errors: SecurityFinding[];
}

const TEMPLATE_VARIABLE = /\{\{[^}]+\}\}/;

const CREDENTIAL_PATTERNS: Array<{ pattern: RegExp; description: string }> = [
  { pattern: /^ghp_[a-zA-Z0-9]{36,}$/, description: 'GitHub personal access token' },
  { pattern: /^gho_[a-zA-Z0-9]{36,}$/, description: 'GitHub OAuth token' },
  { pattern: /^ghs_[a-zA-Z0-9]{36,}$/, description: 'GitHub server-to-server token' },
  { pattern: /^github_pat_[a-zA-Z0-9_]{82}$/, description: 'GitHub fine-grained PAT' },
  { pattern: /^sk-[a-zA-Z0-9]{20,}$/, description: 'OpenAI API key' },
  { pattern: /^sk-ant-[a-zA-Z0-9-]{95,}$/, description: 'Anthropic API key' },
  { pattern: /^xoxb-[0-9]{10,}-[0-9]{10,}-[a-zA-Z0-9]{24,}$/, description: 'Slack bot token' },
  { pattern: /^xoxp-[0-9]{10,}-[0-9]{10,}-[a-zA-Z0-9]{24,}$/, description: 'Slack user token' },
  { pattern: /^gsk_[a-zA-Z0-9]{32,}$/, description: 'Groq API key' },
  { pattern: /^xai-[a-zA-Z0-9]{40,}$/, description: 'xAI API key' },
  { pattern: /^AKIA[A-Z0-9]{16}$/, description: 'AWS access key ID' },
];

/** Auth fields that may hold a credential, in reporting order */
const CREDENTIAL_FIELDS = ['token', 'password', 'value', 'client_secret'] as const;
/** Fields where any literal value is reported */
const GENERIC_CREDENTIAL_FIELDS: ReadonlyArray<string> = ['token', 'password', 'client_secret'];

const BROAD_PATHS = ['/', '~', '~/', '$out', '$out/', '$temp', '$temp/'];

/**
 * `${NAME}` (environment) or `$secret:name` (secret store).
 */
export function isSecretReference(value: string): boolean {
  return (value.startsWith('${') && value.endsWith('}')) || value.startsWith('$secret:');
}

/**
 * Advisory checks. Errors are plaintext credentials; everything else is a warning.
 */
export class SecurityValidator {
  static validate(definition: Definition): SecurityResult {
    const result: SecurityResult = { warnings: [], errors: [] };

    walkSteps(definition.steps, (step) => {
      SecurityValidator.checkShellInjection(step, result);
      SecurityValidator.checkPermissivePath(step, result);
    });

    for (const [name, connector] of Object.entries(definition.connectors ?? {})) {
      if (connector.auth) {
        SecurityValidator.checkPlaintextCredentials(name, connector.auth, result);
      } else if (!BUILTIN_CONNECTORS.some((builtin) => builtin === name)) {
        result.warnings.push({
          stepId: `connectors.${name}`,
          type: 'missing_auth',
          severity: 'warning',
          message: `External connector "${name}" has no auth configuration`,
          suggestion: `Consider adding authentication:\n  connectors:\n    ${name}:\n      auth:\n        token: \${${name.toUpperCase()}_TOKEN}`,
        });
      }
    }

    return result;
  }

  private static checkShellInjection(step: StepDefinition, result: SecurityResult): void {
    if (step.type !== 'builtin' || step.builtin !== 'shell.run') return;
    const command = step.inputs?.command;
    if (typeof command !== 'string' || !TEMPLATE_VARIABLE.test(command)) return;

    result.warnings.push({
      stepId: step.id,
      type: 'shell_injection',
      severity: 'warning',
      message: 'shell.run with string command contains template variables',
      suggestion:
        'This may be vulnerable to command injection. Consider using array form:\n' +
        '  shell.run:\n' +
        '    command: ["cmd", "arg1", "{{.var}}"]',
    });
  }

  private static checkPermissivePath(step: StepDefinition, result: SecurityResult): void {
    if (step.type !== 'builtin' || !step.builtin?.startsWith('file.')) return;
    const path = step.inputs?.path;
    if (typeof path !== 'string' || !BROAD_PATHS.includes(path.trim())) return;

    result.warnings.push({
      stepId: step.id,
      type: 'overly_permissive_path',
      severity: 'warning',
      message: `File path is too broad: ${JSON.stringify(path)}`,
      suggestion:
        'Specify explicit paths instead of root or home directory.\n  Example: ~/projects/myapp instead of ~',
    });
  }

  private static checkPlaintextCredentials(
    name: string,
    auth: ConnectorAuth,
    result: SecurityResult
  ): void {
    const stepId = `connectors.${name}`;
    let reported = false;

    for (const field of CREDENTIAL_FIELDS) {
      const value = auth[field];
      if (!value || isSecretReference(value)) continue;

      const known = CREDENTIAL_PATTERNS.find(({ pattern }) => pattern.test(value));
      if (known) {
        result.errors.push({
          stepId,
          type: 'plaintext_credential',
          severity: 'error',
          message: `Plaintext ${known.description} detected in auth.${field}`,
          suggestion:
            'Use environment variables or secrets instead:\n' +
            `  connectors:\n    ${name}:\n      auth:\n` +
            `        ${field}: \${${name.toUpperCase()}_${field.toUpperCase()}}  # Environment variable\n` +
            `        # OR\n` +
            `        ${field}: $secret:${name.toLowerCase()}_${field}  # Secrets backend`,
        });
        reported = true;
        continue;
      }

      if (!reported && GENERIC_CREDENTIAL_FIELDS.includes(field)) {
        result.errors.push({
          stepId,
          type: 'plaintext_credential',
          severity: 'error',
          message: `Potential plaintext credential in auth.${field}`,
          suggestion: `Use environment variables or secrets:\n  auth:\n    ${field}: \${${name.toUpperCase()}_TOKEN}`,
        });
        reported = true;
      }
    }
  }
}

function walkSteps(steps: StepDefinition[], visit: (step: StepDefinition) => void): void {
  for (const step of steps) {
    visit(step);
    for (const children of childLists(step)) walkSteps(children, visit);
  }
}
