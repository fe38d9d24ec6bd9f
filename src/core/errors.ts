/**
 * Error taxonomy for the outreach pipeline.
 *
 * Scrape, normalization and resolution failures are logged and absorbed by
 * the run; lifecycle and send failures surface per draft to the operator.
 */

export type OutreachErrorCode =
  | "MALFORMED_RECORD"
  | "DRAFT_NOT_FOUND"
  | "TERMINAL_STATE"
  | "DUPLICATE_COMPANY_OUTREACH"
  | "UNAPPROVED_DRAFT"
  | "SEND_FAILED"
  | "LOCK_TIMEOUT"
  | "CONFIG_INVALID"
  | "CONTENT_GENERATION";

export class OutreachError extends Error {
  constructor(readonly code: OutreachErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedRecordError extends OutreachError {
  constructor(readonly source: string, readonly reason: string) {
    super("MALFORMED_RECORD", `Malformed ${source} record: ${reason}`);
  }
}

export class DraftNotFoundError extends OutreachError {
  constructor(readonly draftId: number) {
    super("DRAFT_NOT_FOUND", `Draft #${draftId} not found`);
  }
}

export class TerminalStateError extends OutreachError {
  constructor(readonly draftId: number, readonly status: string, readonly attempted: string) {
    super("TERMINAL_STATE", `Draft #${draftId} is ${status}; cannot ${attempted}`);
  }
}

export class DuplicateCompanyOutreachError extends OutreachError {
  constructor(readonly draftId: number, readonly companyKey: string) {
    super(
      "DUPLICATE_COMPANY_OUTREACH",
      `Draft #${draftId}: an outreach email was already sent to "${companyKey}"`,
    );
  }
}

export class UnapprovedDraftError extends OutreachError {
  constructor(readonly draftId: number) {
    super("UNAPPROVED_DRAFT", `Draft #${draftId} is pending; approve it first or send with --all`);
  }
}

export class SendFailedError extends OutreachError {
  constructor(readonly draftId: number, readonly reason: string) {
    super("SEND_FAILED", `Draft #${draftId} could not be sent: ${reason}`);
  }
}

export class LockTimeoutError extends OutreachError {
  constructor(readonly companyKey: string, readonly waitedMs: number) {
    super("LOCK_TIMEOUT", `Timed out after ${waitedMs}ms waiting for the outreach lock on "${companyKey}"`);
  }
}

export class ConfigError extends OutreachError {
  constructor(readonly issues: string[]) {
    super("CONFIG_INVALID", `Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join("\n")}`);
  }
}

export class ContentGenerationError extends OutreachError {
  constructor(message: string) {
    super("CONTENT_GENERATION", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
