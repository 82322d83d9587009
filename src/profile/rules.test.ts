import { describe, expect, it } from "vitest";

import {
  describeFieldPath,
  isGithubUsernameWithinLimit,
  isValidDomain,
  isValidEmail,
  isValidGithubUsernameFormat,
  PROFILE_FIELDS,
} from "./rules.js";

describe("isValidGithubUsernameFormat", () => {
  it.each(["valid-user1", "octocat", "a", "A-b-C"])("accepts %s", (username) => {
    expect(isValidGithubUsernameFormat(username)).toBe(true);
  });

  it.each(["-bad-", "bad-", "-bad", "double--hyphen", "under_score", "dot.name", ""])(
    "rejects %j",
    (username) => {
      expect(isValidGithubUsernameFormat(username)).toBe(false);
    },
  );
});

describe("isGithubUsernameWithinLimit", () => {
  it("allows 39 characters and rejects 40", () => {
    expect(isGithubUsernameWithinLimit("a".repeat(39))).toBe(true);
    expect(isGithubUsernameWithinLimit("a".repeat(40))).toBe(false);
  });
});

describe("isValidDomain", () => {
  it.each(["example.com", "foo.com", "www.my-site.dev", "a.b.co"])("accepts %s", (domain) => {
    expect(isValidDomain(domain)).toBe(true);
  });

  it.each(["not a domain", "localhost", "-bad.com", "example.c", "http://example.com"])(
    "rejects %j",
    (domain) => {
      expect(isValidDomain(domain)).toBe(false);
    },
  );
});

describe("isValidEmail", () => {
  it("accepts a standard address and rejects one without a domain", () => {
    expect(isValidEmail("ada@example.com")).toBe(true);
    expect(isValidEmail("first.last+tag@mail.example.org")).toBe(true);
    expect(isValidEmail("ada@localhost")).toBe(false);
    expect(isValidEmail("not-an-email")).toBe(false);
  });
});

describe("describeFieldPath", () => {
  it("drops the leading dot", () => {
    expect(describeFieldPath(PROFILE_FIELDS.githubUsername)).toBe("contact.githubUsername");
  });
});
