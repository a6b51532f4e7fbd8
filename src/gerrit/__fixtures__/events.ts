const alice = { name: "Alice Example", username: "alice", email: "alice@example.com" };
const bob = { name: "Bob Example", username: "bob", email: "bob@example.com" };

export const users = { alice, bob };

export function patchSetJson(number: number, overrides: Record<string, unknown> = {}) {
  return {
    number,
    revision: `rev${number}`,
    parents: ["parent0"],
    ref: `refs/changes/01/1/${number}`,
    uploader: alice,
    createdOn: 1_700_000_000,
    author: alice,
    isDraft: false,
    kind: "REWORK",
    sizeInsertions: 10,
    sizeDeletions: -2,
    ...overrides,
  };
}

export function changeJson(id: string, overrides: Record<string, unknown> = {}) {
  return {
    project: "demo",
    branch: "main",
    id,
    number: 1,
    subject: "Fix the frobnicator",
    owner: alice,
    url: "https://gerrit.test/c/demo/+/1",
    commitMessage: "Fix the frobnicator\n\nChange-Id: " + id,
    status: "NEW",
    ...overrides,
  };
}

export function eventJson(type: string, changeId: string, overrides: Record<string, unknown> = {}) {
  return {
    type,
    author: bob,
    approvals: [{ type: "Code-Review", description: "Code-Review", value: "2", oldValue: "0" }],
    comment: "Patch Set 1: Code-Review+2",
    patchSet: patchSetJson(1),
    change: changeJson(changeId),
    project: "demo",
    refName: "refs/heads/main",
    changeKey: { id: changeId },
    eventCreatedOn: 1_700_000_100,
    ...overrides,
  };
}

export function eventLine(type: string, changeId: string, overrides: Record<string, unknown> = {}): string {
  return JSON.stringify(eventJson(type, changeId, overrides));
}
