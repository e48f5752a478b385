import { describe, it, expect } from "vitest";
import { isValidTopicFilter, isWildcardPattern, matchTopic } from "../src/utils/topicMatcher";

describe("isWildcardPattern", () => {
  it("detects single and multi level wildcards", () => {
    expect(isWildcardPattern("sensors/+/temp")).toBe(true);
    expect(isWildcardPattern("sensors/#")).toBe(true);
    expect(isWildcardPattern("sensors/kitchen/temp")).toBe(false);
  });

  it("does not treat a plus inside a level as a wildcard", () => {
    expect(isWildcardPattern("a+b/c")).toBe(false);
  });
});

describe("matchTopic", () => {
  it("matches identical topics", () => {
    expect(matchTopic("plant/status", "plant/status")).toBe(true);
  });

  it("matches exactly one level with +", () => {
    expect(matchTopic("sensors/+/temp", "sensors/kitchen/temp")).toBe(true);
    expect(matchTopic("sensors/+/temp", "sensors/kitchen/left/temp")).toBe(false);
    expect(matchTopic("sensors/+/temp", "sensors/temp")).toBe(false);
  });

  it("matches the remaining levels with #, including the parent", () => {
    expect(matchTopic("sensors/#", "sensors/kitchen/temp")).toBe(true);
    expect(matchTopic("sensors/#", "sensors")).toBe(true);
    expect(matchTopic("sensors/#", "plant/status")).toBe(false);
    expect(matchTopic("#", "a/b/c")).toBe(true);
  });

  it("only accepts # as the last level", () => {
    expect(matchTopic("sensors/#/temp", "sensors/a/temp")).toBe(false);
  });

  it("does not match $ topics with a leading wildcard", () => {
    expect(matchTopic("#", "$SYS/broker/uptime")).toBe(false);
    expect(matchTopic("+/broker/uptime", "$SYS/broker/uptime")).toBe(false);
    expect(matchTopic("$SYS/#", "$SYS/broker/uptime")).toBe(true);
  });

  it("rejects topics longer than the pattern", () => {
    expect(matchTopic("plant/status", "plant/status/extra")).toBe(false);
  });
});

describe("isValidTopicFilter", () => {
  it("accepts plain topics and whole-level wildcards", () => {
    expect(isValidTopicFilter("plant/status")).toBe(true);
    expect(isValidTopicFilter("sensors/+/temp")).toBe(true);
    expect(isValidTopicFilter("sensors/#")).toBe(true);
    expect(isValidTopicFilter("#")).toBe(true);
    expect(isValidTopicFilter("/leading/slash")).toBe(true);
  });

  it("rejects # anywhere but the last level", () => {
    expect(isValidTopicFilter("a/#/b")).toBe(false);
  });

  it("rejects wildcards sharing a level with other characters", () => {
    expect(isValidTopicFilter("sensors/room+/temp")).toBe(false);
    expect(isValidTopicFilter("sensors/#all")).toBe(false);
  });

  it("rejects empty filters and NUL characters", () => {
    expect(isValidTopicFilter("")).toBe(false);
    expect(isValidTopicFilter("a\u0000b")).toBe(false);
  });
});
