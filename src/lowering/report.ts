import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import type { SourceSpan } from '../frontend/ast.js';

/** What a semantic diagnostic is about: the offending name or spelling, and where it was used. */
export interface ReportContext {
  subject: string;
  construct: string;
}

export function errorAt(
  diagnostics: Diagnostic[],
  id: DiagnosticId,
  span: SourceSpan,
  message: string,
  ctx: ReportContext,
): void {
  diagnostics.push({
    id,
    severity: 'error',
    message,
    file: span.file,
    line: span.start.line,
    column: span.start.column,
    subject: ctx.subject,
    construct: ctx.construct,
  });
}
