import http from "http";
import { URL } from "url";

type JsonObject = Record<string, unknown>;

export type FakeFailure = {
  path: string;
  // Listing page the failure applies to; omitted means every request to the path.
  page?: number;
  status: number;
  // How many times to fail before answering normally; omitted means always.
  times?: number;
  headers?: Record<string, string>;
};

export type FakeGitHubFixture = {
  users?: Record<string, JsonObject>;
  followers?: Record<string, JsonObject[]>;
  repos?: Record<string, JsonObject>;
  contributors?: Record<string, JsonObject[]>;
  userRepos?: Record<string, JsonObject[]>;
  failures?: FakeFailure[];
  rateLimit?: { limit: number; remaining: number; resetEpochSeconds?: number };
};

export type FakeGitHub = {
  server: http.Server;
  // Path and query of every request, in arrival order.
  requests: string[];
};

const sendJson = (res: http.ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}) => {
  res.writeHead(status, { "content-type": "application/json", ...headers });
  res.end(JSON.stringify(body));
};

const readPositiveInt = (raw: string | null, fallback: number): number => {
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
};

/**
 * Minimal fake of the GitHub REST endpoints the harvester reads:
 * - GET /users/:login
 * - GET /users/:login/followers
 * - GET /users/:login/repos
 * - GET /repos/:owner/:repo
 * - GET /repos/:owner/:repo/contributors
 * Listings paginate with `per_page`/`page` and answer with a Link header.
 */
export const createFakeGitHubServer = (fixture: FakeGitHubFixture): FakeGitHub => {
  const requests: string[] = [];
  const failureHits = new Map<FakeFailure, number>();
  let remaining = fixture.rateLimit?.remaining ?? 5000;
  const limit = fixture.rateLimit?.limit ?? 5000;
  const reset = fixture.rateLimit?.resetEpochSeconds ?? Math.floor(Date.now() / 1000) + 3600;

  const findFailure = (path: string, page: number): FakeFailure | undefined =>
    fixture.failures?.find((failure) => {
      if (failure.path !== path) return false;
      if (failure.page != null && failure.page !== page) return false;
      const hits = failureHits.get(failure) ?? 0;
      return failure.times == null || hits < failure.times;
    });

  const server = http.createServer((req, res) => {
    const host = req.headers.host ?? "127.0.0.1";
    const url = new URL(req.url ?? "/", `http://${host}`);
    requests.push(`${url.pathname}${url.search}`);

    remaining = Math.max(0, remaining - 1);
    const rateHeaders = {
      "x-ratelimit-limit": String(limit),
      "x-ratelimit-remaining": String(remaining),
      "x-ratelimit-reset": String(reset)
    };

    const page = readPositiveInt(url.searchParams.get("page"), 1);
    const failure = findFailure(url.pathname, page);
    if (failure) {
      failureHits.set(failure, (failureHits.get(failure) ?? 0) + 1);
      return sendJson(res, failure.status, { message: "Injected failure" }, { ...rateHeaders, ...failure.headers });
    }

    const paginate = (items: JsonObject[] | undefined) => {
      if (items == null) return sendJson(res, 404, { message: "Not Found" }, rateHeaders);

      const perPage = readPositiveInt(url.searchParams.get("per_page"), 30);
      const slice = items.slice((page - 1) * perPage, page * perPage);
      const headers: Record<string, string> = { ...rateHeaders };
      if (page * perPage < items.length) {
        const next = new URL(url.toString());
        next.searchParams.set("page", String(page + 1));
        headers.link = `<${next.toString()}>; rel="next"`;
      }
      return sendJson(res, 200, slice, headers);
    };

    const lookup = (record: JsonObject | undefined) =>
      record == null ? sendJson(res, 404, { message: "Not Found" }, rateHeaders) : sendJson(res, 200, record, rateHeaders);

    const segments = url.pathname.split("/").filter((segment) => segment !== "").map(decodeURIComponent);
    const [root, first, second, third, ...rest] = segments;
    if (rest.length > 0) return sendJson(res, 404, { message: "Not Found" }, rateHeaders);

    if (root === "users" && first != null) {
      if (second == null) return lookup(fixture.users?.[first]);
      if (second === "followers" && third == null) return paginate(fixture.followers?.[first]);
      if (second === "repos" && third == null) return paginate(fixture.userRepos?.[first]);
    }

    if (root === "repos" && first != null && second != null) {
      const fullName = `${first}/${second}`;
      if (third == null) return lookup(fixture.repos?.[fullName]);
      if (third === "contributors") return paginate(fixture.contributors?.[fullName]);
    }

    return sendJson(res, 404, { message: "Not Found" }, rateHeaders);
  });

  return { server, requests };
};

export const makeUser = (login: string, id: number): JsonObject => ({
  login,
  id,
  name: `User ${id}`,
  company: "@fake-org",
  blog: `https://blog.example.com/${login}`,
  email: null,
  bio: "Writes code",
  public_repos: id % 7,
  followers: id % 11,
  following: id % 5,
  created_at: "2015-03-04T05:06:07Z"
});

/** Deterministic sample data for running the CLI against the fake locally. */
export const buildDemoFixture = (): FakeGitHubFixture => {
  const followers = Array.from({ length: 137 }, (_, index) => makeUser(`follower-${index + 1}`, index + 1));
  const users: Record<string, JsonObject> = { octocat: makeUser("octocat", 1000) };
  for (const follower of followers) users[String(follower.login)] = follower;

  return {
    users,
    followers: { octocat: followers.map((follower) => ({ login: follower.login, id: follower.id })) },
    repos: {
      "octocat/hello-world": {
        full_name: "octocat/hello-world",
        description: "My first repository",
        stargazers_count: 42,
        forks_count: 7,
        open_issues_count: 3,
        created_at: "2011-01-26T19:01:12Z"
      }
    },
    contributors: {
      "octocat/hello-world": Array.from({ length: 12 }, (_, index) => ({
        login: `contributor-${index + 1}`,
        contributions: 100 - index,
        html_url: `https://github.com/contributor-${index + 1}`
      }))
    },
    userRepos: {
      octocat: Array.from({ length: 8 }, (_, index) => ({
        full_name: `octocat/repo-${index + 1}`,
        name: `repo-${index + 1}`,
        description: index % 2 === 0 ? "A fork" : "An original",
        html_url: `https://github.com/octocat/repo-${index + 1}`,
        fork: index % 2 === 0,
        created_at: "2020-01-01T00:00:00Z",
        updated_at: "2024-06-30T12:00:00Z"
      }))
    }
  };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_GITHUB_PORT ?? 3999);
  const { server } = createFakeGitHubServer(buildDemoFixture());

  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake GitHub API on http://localhost:${port}`);
  });
}
