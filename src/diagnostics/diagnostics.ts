// Structured diagnostics for IR traversal failures

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
}

export enum DiagnosticCode {
  // Internal consistency (I001-I099)：遍历引擎与节点集合不一致
  I001_UnknownExprKind = 'I001',
  I002_MissingHandler = 'I002',

  // Contract violations (C001-C099)：由 pass 作者的覆写引起
  C001_BinderMismatch = 'C001',
  C002_TypeBinderMismatch = 'C002',

  // Resource limits (R001-R099)
  R001_DepthLimitExceeded = 'R001',

  // Configuration (G001-G099)
  G001_InvalidConfigValue = 'G001',
}

/**
 * 诊断发生时的遍历上下文。
 */
export interface DiagnosticContext {
  /** 发起遍历的 pass 名称 */
  readonly pass?: string;
  /** 出问题的节点种类 */
  readonly nodeKind?: string;
  /** 出问题的位置，例如 `Function.params[1]` */
  readonly position?: string;
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly context?: DiagnosticContext;
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get code(): DiagnosticCode {
    return this.diagnostic.code;
  }
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private context: { pass?: string; nodeKind?: string; position?: string } = {};

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  static warning(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Warning).withCode(code);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withPass(pass: string): DiagnosticBuilder {
    this.context.pass = pass;
    return this;
  }

  withNodeKind(kind: string): DiagnosticBuilder {
    this.context.nodeKind = kind;
    return this;
  }

  withPosition(position: string): DiagnosticBuilder {
    this.context.position = position;
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');

    const context: DiagnosticContext = { ...this.context };
    return Object.keys(context).length > 0
      ? { severity: this.severity, code: this.code, message: this.message, context }
      : { severity: this.severity, code: this.code, message: this.message };
  }

  throw(): never {
    throw new DiagnosticError(this.build());
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  unknownExprKind: (kind: string, validKinds: readonly string[]): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.I001_UnknownExprKind)
      .withMessage(`Unknown expression kind '${kind}', expected one of: ${validKinds.join(', ')}`)
      .withNodeKind(kind),

  missingHandler: (kind: string, functor: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.I002_MissingHandler)
      .withMessage(`${functor} has no handler for expression kind '${kind}'`)
      .withNodeKind(kind),

  binderMismatch: (position: string, actual: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.C001_BinderMismatch)
      .withMessage(`Type mismatch at ${position}: expected Variable, got ${actual}`)
      .withNodeKind(actual)
      .withPosition(position),

  typeBinderMismatch: (position: string, actual: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.C002_TypeBinderMismatch)
      .withMessage(`Type mismatch at ${position}: expected TypeVar, got ${actual}`)
      .withNodeKind(actual)
      .withPosition(position),

  depthLimitExceeded: (limit: number, kind: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.R001_DepthLimitExceeded)
      .withMessage(`Expression nesting exceeds the traversal depth limit of ${limit}`)
      .withNodeKind(kind),

  invalidConfigValue: (name: string, raw: string, expected: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.G001_InvalidConfigValue)
      .withMessage(`Invalid value '${raw}' for ${name}: expected ${expected}`),
};

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { severity, code, message, context } = diagnostic;
  let result = `${severity} ${code}: ${message}`;
  if (context?.pass) {
    result += ` [pass ${context.pass}]`;
  }
  return result;
}
