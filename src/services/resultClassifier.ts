import { ManagerProfile } from "../managers.js";
import { CheckStatus } from "../types.js";
import { containsMarker, summarizeOutput } from "../utils/text.js";

export interface Classification {
  status: CheckStatus;
  message: string;
}

export const NO_VERIFIER_MESSAGE = "No verifier implemented for this manager.";

export function classifyResult(
  profile: ManagerProfile | undefined,
  identifier: string,
  returnCode: number,
  output: string
): Classification {
  if (!profile) {
    return { status: "skipped", message: NO_VERIFIER_MESSAGE };
  }

  if (containsMarker(output, profile.notFoundMarkers)) {
    return {
      status: "not-found",
      message: `${profile.label} reported no matching package. Output: ${summarizeOutput(output)}`
    };
  }

  if (returnCode !== 0) {
    return { status: "error", message: summarizeOutput(output) };
  }

  if (profile.requireMatchingLine) {
    const lines = output
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean);

    if (lines.length === 0) {
      return {
        status: "not-found",
        message: `${profile.label} returned no search results. Output: ${summarizeOutput(output)}`
      };
    }

    if (!lines.some((line) => startsWithIdentifier(line, identifier))) {
      return { status: "not-found", message: summarizeOutput(output) };
    }
  }

  return { status: "ok", message: profile.successMessage };
}

function startsWithIdentifier(line: string, identifier: string): boolean {
  const lowerLine = line.toLowerCase();
  const lowerId = identifier.toLowerCase();
  return lowerLine === lowerId || lowerLine.startsWith(`${lowerId} `) || lowerLine.startsWith(`${lowerId}(`);
}
