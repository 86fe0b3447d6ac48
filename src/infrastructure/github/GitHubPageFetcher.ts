import { InvalidContinuationError, MalformedPageError } from "../../core/errors/harvest.errors";
import type { Page, RawRecord } from "../../core/records/record.types";
import type { FetchTarget } from "../../core/target/fetchTarget";
import type { GitHubTransport } from "../../ports/GitHubTransport";
import type { PageSource } from "../../ports/PageSource";
import { parseLinkHeader } from "./linkHeader";

const isRawRecord = (value: unknown): value is RawRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const joinPath = (baseUrl: string, segments: string[]): URL => {
  const url = new URL(baseUrl);
  const basePath = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
  url.pathname = `${basePath}/${segments.map(encodeURIComponent).join("/")}`;
  return url;
};

/**
 * Reads GitHub list endpoints one page at a time. The continuation token is
 * the absolute `rel="next"` URL GitHub returns in the Link header.
 */
export class GitHubPageFetcher implements PageSource {
  private readonly origin: string;

  constructor(
    private readonly transport: GitHubTransport,
    private readonly baseUrl: string,
    private readonly pageSize = 100
  ) {
    this.origin = new URL(baseUrl).origin;
  }

  private listingUrl(target: FetchTarget): URL {
    switch (target.kind) {
      case "followers":
        return joinPath(this.baseUrl, ["users", target.username, "followers"]);
      case "contributors":
        return joinPath(this.baseUrl, ["repos", target.owner, target.repo, "contributors"]);
      case "forks": {
        const url = joinPath(this.baseUrl, ["users", target.username, "repos"]);
        url.searchParams.set("type", "owner");
        return url;
      }
    }
  }

  firstPageUrl(target: FetchTarget): string {
    const url = this.listingUrl(target);
    url.searchParams.set("per_page", String(this.pageSize));
    return url.toString();
  }

  private resolveContinuation(token: string): string {
    let parsed: URL;
    try {
      parsed = new URL(token);
    } catch {
      throw new InvalidContinuationError({ message: "Continuation token is not an absolute URL" });
    }
    if (parsed.origin !== this.origin) {
      throw new InvalidContinuationError({
        message: `Continuation token points outside ${this.origin}`,
        context: { url: `${parsed.origin}${parsed.pathname}` }
      });
    }
    return parsed.toString();
  }

  async fetchPage(target: FetchTarget, continuationToken?: string): Promise<Page> {
    const url = continuationToken == null ? this.firstPageUrl(target) : this.resolveContinuation(continuationToken);
    const { body, meta } = await this.transport.request({ url });

    // GitHub answers 204 for listings of empty repositories.
    if (body === null) return { records: [] };

    if (!Array.isArray(body)) {
      throw new MalformedPageError({
        message: "GitHub listing response is not an array",
        context: { status: meta.status, url: new URL(url).pathname }
      });
    }

    const next = parseLinkHeader(meta.link).next;
    return {
      // Non-object entries become empty records so the normalizer counts them as invalid.
      records: body.map((entry: unknown): RawRecord => (isRawRecord(entry) ? entry : {})),
      ...(next ? { next } : {})
    };
  }

  fetchUser(login: string): Promise<RawRecord> {
    return this.fetchObject(joinPath(this.baseUrl, ["users", login]).toString());
  }

  fetchRepository(owner: string, repo: string): Promise<RawRecord> {
    return this.fetchObject(joinPath(this.baseUrl, ["repos", owner, repo]).toString());
  }

  private async fetchObject(url: string): Promise<RawRecord> {
    const { body, meta } = await this.transport.request({ url });
    if (!isRawRecord(body)) {
      throw new MalformedPageError({
        message: "GitHub resource response is not an object",
        context: { status: meta.status, url: new URL(url).pathname }
      });
    }
    return body;
  }
}
