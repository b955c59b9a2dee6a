/**
 * Internal invariant violations. These indicate a defect in the codec itself
 * and travel separately from protocol parse failures, which go to the parser
 * visitor.
 */

export class CodecBugError extends Error {
  constructor(
    readonly bugId: string,
    message: string,
  ) {
    super(message);
    this.name = 'CodecBugError';
  }
}

export type BugHandler = (bug: CodecBugError) => void;

const defaultBugHandler: BugHandler = (bug) => {
  console.error(`[capsule-bug] ${bug.bugId}: ${bug.message}`);
};

let bugHandler: BugHandler = defaultBugHandler;

/** Replaces the process-wide handler; call with no argument to restore the default. */
export function setBugHandler(handler?: BugHandler): void {
  bugHandler = handler ?? defaultBugHandler;
}

export function reportBug(bugId: string, message: string): CodecBugError {
  const bug = new CodecBugError(bugId, message);
  bugHandler(bug);
  return bug;
}
