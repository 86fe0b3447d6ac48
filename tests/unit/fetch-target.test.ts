import { describeTarget, parseFetchTarget } from "../../src/core/target/fetchTarget";

describe("parseFetchTarget", () => {
  it.each([
    ["followers:octocat", { kind: "followers", username: "octocat" }],
    ["forks:octo-cat.dev", { kind: "forks", username: "octo-cat.dev" }],
    ["contributors:octocat/hello_world", { kind: "contributors", owner: "octocat", repo: "hello_world" }]
  ])("parses %s", (input, expected) => {
    expect(parseFetchTarget(input)).toEqual(expected);
  });

  it("falls back to the default username for bare user-scoped kinds", () => {
    expect(parseFetchTarget("followers", "octocat")).toEqual({ kind: "followers", username: "octocat" });
    expect(parseFetchTarget("forks", "octocat")).toEqual({ kind: "forks", username: "octocat" });
  });

  it("rejects unknown kinds", () => {
    expect(() => parseFetchTarget("stars:octocat")).toThrow(
      'Unknown harvest kind "stars". Expected one of: followers, contributors, forks'
    );
  });

  it.each(["contributors:octocat", "contributors:a/b/c", "contributors"])("rejects malformed repository %s", (input) => {
    expect(() => parseFetchTarget(input, "octocat")).toThrow(
      `contributors target must look like contributors:<owner>/<repo>. Received: ${input}`
    );
  });

  it("rejects identities with unsafe characters or no identity at all", () => {
    expect(() => parseFetchTarget("followers:../etc")).toThrow("username must match");
    expect(() => parseFetchTarget("followers")).toThrow("username must match");
  });

  it("round-trips through describeTarget", () => {
    for (const input of ["followers:octocat", "contributors:octocat/hello-world", "forks:octocat"]) {
      expect(describeTarget(parseFetchTarget(input))).toBe(input);
    }
  });
});
