/**
 * Error Handling
 *
 * Categorizes failures reported by the PDF backend. pdf.js and Node report
 * most conditions only through error names, codes and message text, so the
 * matching here is substring-based and best-effort.
 */

export enum ErrorCategory {
  NOT_FOUND = "not_found",
  ENCRYPTED = "encrypted",
  PERMISSION = "permission",
  INVALID_DOCUMENT = "invalid_document",
  TIMEOUT = "timeout",
  ABORTED = "aborted",
  INTERNAL = "internal",
}

export interface ExtractionError {
  category: ErrorCategory;
  message: string;
  originalError: Error;
}

/**
 * Node system error code (ENOENT, EACCES, ...) if present
 */
export function getErrorCode(error: unknown): string | null {
  if (!error || typeof error !== "object") return null;
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

/**
 * Categorize an error raised while opening or reading a document
 */
export function categorizeError(error: unknown): ExtractionError {
  const err = error instanceof Error ? error : new Error(String(error));
  const message = err.message.toLowerCase();
  const code = getErrorCode(err);

  const result = (category: ErrorCategory): ExtractionError => ({
    category,
    message: err.message,
    originalError: err,
  });

  // Node puts the file path in ENOENT messages, so codes and exception
  // names are checked before any message text.
  switch (code) {
    case "ENOENT":
      return result(ErrorCategory.NOT_FOUND);
    case "EACCES":
    case "EPERM":
      return result(ErrorCategory.PERMISSION);
    case "EISDIR":
      return result(ErrorCategory.INVALID_DOCUMENT);
  }

  switch (err.name) {
    case "AbortError":
      return result(ErrorCategory.ABORTED);
    case "TimeoutError":
      return result(ErrorCategory.TIMEOUT);
    // pdf.js raises PasswordException for encrypted documents
    case "PasswordException":
      return result(ErrorCategory.ENCRYPTED);
    case "MissingPDFException":
      return result(ErrorCategory.NOT_FOUND);
    case "InvalidPDFException":
    case "UnknownErrorException":
    case "FormatError":
      return result(ErrorCategory.INVALID_DOCUMENT);
  }

  if (message.includes("aborted") || message.includes("cancelled")) {
    return result(ErrorCategory.ABORTED);
  }

  if (message.includes("timed out") || message.includes("timeout")) {
    return result(ErrorCategory.TIMEOUT);
  }

  if (message.includes("encrypt") || message.includes("password")) {
    return result(ErrorCategory.ENCRYPTED);
  }

  if (message.includes("no such file") || message.includes("not found") || message.includes("does not exist")) {
    return result(ErrorCategory.NOT_FOUND);
  }

  if (message.includes("permission denied")) {
    return result(ErrorCategory.PERMISSION);
  }

  if (message.includes("invalid pdf")) {
    return result(ErrorCategory.INVALID_DOCUMENT);
  }

  return result(ErrorCategory.INTERNAL);
}

/**
 * Error message recorded on a failed extraction result
 */
export function describeExtractionFailure(error: unknown, pdfPath: string): string {
  const categorized = categorizeError(error);

  switch (categorized.category) {
    case ErrorCategory.NOT_FOUND:
      return `File not found: ${pdfPath}`;
    case ErrorCategory.ENCRYPTED:
      return `PDF is encrypted: ${categorized.message}`;
    case ErrorCategory.PERMISSION:
      return `Permission denied: ${pdfPath}`;
    case ErrorCategory.INVALID_DOCUMENT:
      return `Error extracting text: ${categorized.message}`;
    case ErrorCategory.TIMEOUT:
      return `Text extraction timed out: ${categorized.message}`;
    case ErrorCategory.ABORTED:
      return "Extraction cancelled";
    case ErrorCategory.INTERNAL:
      return `Unexpected error: ${categorized.message}`;
  }
}
