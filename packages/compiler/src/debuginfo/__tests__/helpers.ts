import type { SourceLocator } from "../backend.js";
import { RecordingDebugInfoBackend } from "../recording-backend.js";

/** Reports every span on line 1 with its start offset as the column. */
export const offsetLocator: SourceLocator = {
  spanStart: (span) => ({ file: span.file, line: 1, column: span.start }),
};

export const createRecordingSetup = (name = "main") => {
  const backend = new RecordingDebugInfoBackend();
  const fnScope = backend.createFunctionScope({ file: "test.rs", name, line: 1 });
  return { backend, fnScope, locator: offsetLocator };
};
