import { loggers } from "../config/logger";

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

/**
 * Expands {Y}, {m} and {d} in an index name template with the local date.
 * Any other {...} token is left as it is.
 */
export function resolveIndexName(template: string, now: Date = new Date()): string {
  const resolved = template
    .replaceAll("{Y}", pad(now.getFullYear(), 4))
    .replaceAll("{m}", pad(now.getMonth() + 1))
    .replaceAll("{d}", pad(now.getDate()));

  if (resolved !== template) {
    loggers.provisioner.debug("Replacing placeholders in index name", {
      template,
      index: resolved,
    });
  }

  return resolved;
}
