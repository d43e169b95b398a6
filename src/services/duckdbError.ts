// ============================================================================
// ERROR TYPES AND PARSING
// ============================================================================

/**
 * Parsed DuckDB error with location information
 */
export interface DuckDBError {
  type: string; // "Parser", "Catalog", "Binder", "INTERRUPT", etc.
  message: string; // Human-readable error message
  subtype?: string; // "SYNTAX_ERROR", "ENTRY_ALREADY_EXISTS", etc.
  position?: number; // Character offset in SQL (for parser errors)
  name?: string; // Object name (for catalog errors)
  line?: number; // 1-indexed line number
  column?: number; // 0-indexed column number
  sql?: string;
}

function stringField(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : undefined;
}

/**
 * Parse a DuckDB error message.
 * DuckDB returns errors as JSON when `SET errors_as_json = true` is enabled;
 * older plain-text messages are handled by the fallback.
 */
export function parseDuckDBError(errorMessage: string, sql?: string): DuckDBError {
  const jsonMatch = errorMessage.match(/\{[^{}]*"exception_type"[^{}]*\}/);

  if (jsonMatch) {
    try {
      const parsed: unknown = JSON.parse(jsonMatch[0]);
      if (typeof parsed !== "object" || parsed === null) {
        throw new SyntaxError("Not an error object");
      }

      const error: DuckDBError = {
        type: stringField(parsed, "exception_type") || "Unknown",
        message: stringField(parsed, "exception_message") || errorMessage,
        subtype: stringField(parsed, "error_subtype"),
        name: stringField(parsed, "name"),
        sql,
      };

      const position = stringField(parsed, "position");
      if (position) {
        error.position = parseInt(position, 10);
        if (sql && !isNaN(error.position)) {
          const location = offsetToLineColumn(sql, error.position);
          error.line = location.line;
          error.column = location.column;
        }
      }

      return error;
    } catch {
      // not JSON after all; fall through to the plain-text form
    }
  }

  // Fallback: old-style "LINE X:" format
  const lineMatch = errorMessage.match(/LINE\s+(\d+):/);
  const error: DuckDBError = {
    type: "Error",
    message: errorMessage,
    sql,
  };

  if (lineMatch) {
    error.line = parseInt(lineMatch[1], 10);
  }

  return error;
}

/**
 * Convert a character offset to line and column numbers.
 * @param offset 0-indexed character offset
 * @returns { line: 1-indexed, column: 0-indexed }
 */
export function offsetToLineColumn(
  text: string,
  offset: number
): { line: number; column: number } {
  let line = 1;
  let lastNewline = -1;

  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === "\n") {
      line++;
      lastNewline = i;
    }
  }

  const column = offset - lastNewline - 1;
  return { line, column: Math.max(0, column) };
}
