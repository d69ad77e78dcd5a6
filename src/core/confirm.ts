import { fromDateStamp, toDateStamp, type DateCandidate } from "./date.js";
import type { Logger } from "./logger.js";
import type { FileOpener, Prompt } from "./prompt.js";
import type { Resolution } from "./resolve.js";

export type ConfirmContext = {
  /** Shown in the question, and handed to the opener on "o". */
  file: string;
  prompt: Prompt;
  logger: Logger;
  open?: FileOpener;
};

export function confirmQuestion(
  file: string,
  suggested: DateCandidate | null,
  canOpen = false,
) {
  const hint = suggested ? toDateStamp(suggested) : "";
  const format = canOpen ? "YYYYMMDD, 'o' to open" : "YYYYMMDD";
  return `Please validate/enter the date for ${file} (${format}) [${hint}]: `;
}

/**
 * Asks the operator for a date until they give a valid YYYYMMDD stamp.
 * An empty answer accepts the suggestion. Returns the resolution's candidate
 * untouched when it needs no confirmation.
 */
export async function confirmDate(
  resolution: Resolution,
  ctx: ConfirmContext,
): Promise<DateCandidate> {
  const { candidate, needsConfirmation } = resolution;
  if (candidate && !needsConfirmation) return candidate;

  const question = confirmQuestion(ctx.file, candidate, ctx.open !== undefined);

  for (;;) {
    const answer = (await ctx.prompt.ask(question)).trim();

    if (answer.toLowerCase() === "o" && ctx.open) {
      try {
        await ctx.open(ctx.file);
      } catch (err) {
        ctx.logger.error(`Could not open ${ctx.file}`, err);
      }
      continue;
    }

    const stamp = answer === "" && candidate ? toDateStamp(candidate) : answer;
    const date = /^\d{8}$/.test(stamp) ? fromDateStamp(stamp) : null;
    if (date) {
      ctx.logger.debug(`Date stamp provided manually: ${stamp}`);
      return { ...date, source: "user", confident: true };
    }

    ctx.logger.warn("Invalid date format. Please try again.");
  }
}
