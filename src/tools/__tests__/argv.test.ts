import { describe, it, expect } from "vitest";
import { buildCreateIssueArgs, extractBugId } from "../create-issue.js";
import { buildListIssuesArgs } from "../list-issues.js";
import { buildShowIssueArgs } from "../show-issue.js";
import { buildAddCommentArgs } from "../add-comment.js";
import { buildUpdateIssueStatusArgs } from "../update-issue-status.js";
import { buildUpdateIssueTitleArgs } from "../update-issue-title.js";
import { buildDeleteIssueArgs } from "../delete-issue.js";

describe("buildCreateIssueArgs", () => {
  it("passes title and message and ends in non-interactive mode", () => {
    expect(buildCreateIssueArgs({ title: "X", message: "Y" })).toEqual([
      "bug", "new", "--title", "X", "--message", "Y", "--non-interactive",
    ]);
  });
});

describe("extractBugId", () => {
  it("takes the last output line", () => {
    expect(extractBugId("Building cache...\n  4e1d2a9 created\n")).toBe("4e1d2a9 created");
  });

  it("returns an empty string for empty output", () => {
    expect(extractBugId("")).toBe("");
  });
});

describe("buildListIssuesArgs", () => {
  it("lists everything when no filter is given", () => {
    expect(buildListIssuesArgs({})).toEqual(["bug"]);
  });

  it("adds each supplied filter as its flag", () => {
    expect(buildListIssuesArgs({ status: "open" })).toEqual(["bug", "--status", "open"]);
    expect(buildListIssuesArgs({ author: "alice" })).toEqual(["bug", "--author", "alice"]);
    expect(buildListIssuesArgs({ label: "ui" })).toEqual(["bug", "--label", "ui"]);
    expect(buildListIssuesArgs({ format: "json" })).toEqual(["bug", "--format", "json"]);
  });

  it("puts the query last as a positional argument", () => {
    expect(buildListIssuesArgs({ query: "crash", status: "closed", label: "backend" })).toEqual([
      "bug", "--status", "closed", "--label", "backend", "crash",
    ]);
  });

  it("skips filters given as empty strings", () => {
    expect(buildListIssuesArgs({ status: "", author: "", query: "" })).toEqual(["bug"]);
  });
});

describe("buildShowIssueArgs", () => {
  it("shows the bug with no extra flags by default", () => {
    expect(buildShowIssueArgs({ bug_id: "4e1d2a9" })).toEqual(["bug", "show", "4e1d2a9"]);
  });

  it("adds format and field when supplied", () => {
    expect(buildShowIssueArgs({ bug_id: "4e1d2a9", format: "json" })).toEqual([
      "bug", "show", "4e1d2a9", "--format", "json",
    ]);
    expect(buildShowIssueArgs({ bug_id: "4e1d2a9", format: "json", field: "title" })).toEqual([
      "bug", "show", "4e1d2a9", "--format", "json", "--field", "title",
    ]);
  });
});

describe("buildAddCommentArgs", () => {
  it("comments in non-interactive mode", () => {
    expect(buildAddCommentArgs({ bug_id: "4e1d2a9", message: "Still failing on main" })).toEqual([
      "bug", "comment", "new", "4e1d2a9", "--message", "Still failing on main", "--non-interactive",
    ]);
  });
});

describe("buildUpdateIssueStatusArgs", () => {
  it("maps open and closed onto the status subcommands", () => {
    expect(buildUpdateIssueStatusArgs({ bug_id: "4e1d2a9", status: "open" })).toEqual([
      "bug", "status", "open", "4e1d2a9",
    ]);
    expect(buildUpdateIssueStatusArgs({ bug_id: "4e1d2a9", status: "closed" })).toEqual([
      "bug", "status", "close", "4e1d2a9",
    ]);
  });

  it("rejects anything else", () => {
    expect(buildUpdateIssueStatusArgs({ bug_id: "4e1d2a9", status: "close" })).toBeUndefined();
    expect(buildUpdateIssueStatusArgs({ bug_id: "4e1d2a9", status: "toString" })).toBeUndefined();
  });
});

describe("buildUpdateIssueTitleArgs", () => {
  it("edits the title in non-interactive mode", () => {
    expect(buildUpdateIssueTitleArgs({ bug_id: "4e1d2a9", title: "Crash on empty config" })).toEqual([
      "bug", "title", "edit", "4e1d2a9", "--title", "Crash on empty config", "--non-interactive",
    ]);
  });
});

describe("buildDeleteIssueArgs", () => {
  it("removes the bug", () => {
    expect(buildDeleteIssueArgs({ bug_id: "4e1d2a9" })).toEqual(["bug", "rm", "4e1d2a9"]);
  });
});
