import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  M0100: { code: "M0100", severity: "error", category: "Serialize", template: "Unsupported type: {shape}" },
  M0101: { code: "M0101", severity: "error", category: "Serialize", template: "Circular reference at {path}" },
  M0102: { code: "M0102", severity: "error", category: "Serialize", template: "Nesting deeper than {limit} levels" },

  M0200: { code: "M0200", severity: "error", category: "Parse", template: "Type mismatch: expected {expected}, got {actual}" },
  M0201: { code: "M0201", severity: "error", category: "Parse", template: "Required field missing: {field}" },
  M0202: { code: "M0202", severity: "error", category: "Parse", template: "No strategy registered for {expected}" },

  M0300: { code: "M0300", severity: "error", category: "Strategy", template: "Strategy {strategy} threw: {error}" },
  M0301: { code: "M0301", severity: "error", category: "Descriptor", template: "Invalid type descriptor: {reason}" },

  M0400: { code: "M0400", severity: "info", category: "Lenient", template: "Passed through {actual} where {expected} was expected" },
  M0401: { code: "M0401", severity: "info", category: "Lenient", template: "Field {field} missing, using zero value" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  path?: string
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    path,
    data: params,
  };
}
