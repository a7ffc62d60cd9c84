import type { RunResult } from '../contracts/run.js'

/**
 * Formats run result data as JSON output.
 *
 * @param result Run result.
 * @param indentation Number of spaces used for indentation.
 * @returns JSON representation.
 */
export const formatRunResultAsJson = (result: RunResult, indentation = 2): string => {
  return JSON.stringify(result, null, indentation)
}
