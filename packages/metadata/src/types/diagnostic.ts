/**
 * Diagnostic types for descriptor loading and source extraction
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "PLN1001" // Source file not found
  | "PLN1002" // Failed to read source file
  | "PLN2001" // Unsupported type annotation (mapped to Object)
  | "PLN2002" // Computed member name skipped
  // Descriptor loading errors (PLN9001-PLN9018)
  | "PLN9001" // Descriptor file not found
  | "PLN9002" // Failed to read descriptor file
  | "PLN9003" // Invalid JSON in descriptor file
  | "PLN9004" // Descriptor file must be an object
  | "PLN9005" // Missing or invalid 'types' field
  | "PLN9006" // Invalid type: must be an object
  | "PLN9007" // Invalid type: missing or invalid field
  | "PLN9008" // Invalid type: 'kind' must be one of ...
  | "PLN9009" // Invalid type reference
  | "PLN9010" // Invalid member
  | "PLN9011" // Invalid accessibility
  | "PLN9016" // Descriptor directory not found
  | "PLN9017" // Not a directory
  | "PLN9018"; // No .descriptors.json files found

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
