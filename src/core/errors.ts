/**
 * @fileoverview Audit error hierarchy
 *
 * Per-file problems (IndexError) are collected as warnings; load-time and
 * engine problems are fatal and abort the run before any report is produced.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  fatal: boolean;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class AuditError extends Error {
  abstract readonly code: string;
  abstract readonly fatal: boolean;

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      fatal: this.fatal,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// INDEX ERRORS
// ============================================================================

export type IndexFailureReason = 'read' | 'timeout' | 'encoding' | 'too_large';

export class IndexError extends AuditError {
  readonly code = 'INDEX_ERROR';
  readonly fatal = false;

  constructor(
    readonly filePath: string,
    readonly reason: IndexFailureReason,
    message: string,
  ) {
    super(`Cannot index ${filePath} (${reason}): ${message}`);
    this.name = 'IndexError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        filePath: this.filePath,
        reason: this.reason,
      },
    };
  }
}

// ============================================================================
// RULE COMPILE ERRORS
// ============================================================================

export class RuleCompileError extends AuditError {
  readonly code = 'RULE_COMPILE_ERROR';
  readonly fatal = true;

  constructor(
    readonly ruleId: string | null,
    readonly problem: string,
  ) {
    super(ruleId ? `Rule ${ruleId}: ${problem}` : `Rule corpus: ${problem}`);
    this.name = 'RuleCompileError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        ruleId: this.ruleId,
        problem: this.problem,
      },
    };
  }
}

// ============================================================================
// ENGINE ERRORS
// ============================================================================

export type EngineErrorReason = 'root_unreadable' | 'corpus_missing' | 'invariant';

export class EngineError extends AuditError {
  readonly code = 'ENGINE_ERROR';
  readonly fatal = true;

  constructor(
    readonly reason: EngineErrorReason,
    message: string,
    readonly cause?: Error,
  ) {
    super(message);
    this.name = 'EngineError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        reason: this.reason,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// CONFIG ERRORS
// ============================================================================

export class ConfigError extends AuditError {
  readonly code = 'CONFIG_ERROR';
  readonly fatal = true;

  constructor(
    readonly configPath: string,
    readonly issues: string[],
  ) {
    super(`Invalid configuration in ${configPath}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configPath: this.configPath,
        issues: this.issues,
      },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isAuditError(error: unknown): error is AuditError {
  return error instanceof AuditError;
}

export function isFatalError(error: unknown): boolean {
  return isAuditError(error) && error.fatal;
}
