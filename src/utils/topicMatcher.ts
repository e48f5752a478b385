/**
 * A filter is valid when "+" and "#" each fill a whole level and "#" is the
 * last level. Empty filters and NUL characters are rejected.
 */
export function isValidTopicFilter(pattern: string): boolean {
  if (pattern === "" || pattern.includes("\u0000")) return false;

  const levels = pattern.split("/");
  return levels.every((level, i) => {
    if (level === "#") return i === levels.length - 1;
    if (level === "+") return true;
    return !level.includes("+") && !level.includes("#");
  });
}

export const isWildcardPattern = (pattern: string): boolean =>
  pattern.split("/").some((level) => level === "+" || level === "#");

/**
 * MQTT topic filter matching. "+" matches exactly one level, "#" (last level
 * only) matches the remaining levels including the parent level itself.
 * Topics starting with "$" are never matched by a leading wildcard.
 */
export function matchTopic(pattern: string, topic: string): boolean {
  if (pattern === topic) return true;

  const patternLevels = pattern.split("/");
  const topicLevels = topic.split("/");

  if (topic.startsWith("$") && (patternLevels[0] === "+" || patternLevels[0] === "#")) {
    return false;
  }

  for (let i = 0; i < patternLevels.length; i++) {
    const level = patternLevels[i];

    if (level === "#") {
      return i === patternLevels.length - 1;
    }
    if (i >= topicLevels.length) {
      return false;
    }
    if (level !== "+" && level !== topicLevels[i]) {
      return false;
    }
  }

  return patternLevels.length === topicLevels.length;
}
