import {
  classifyDetailFailure,
  classifyRecordFailure,
  toJobFailure
} from "../../src/application/harvest/harvest.error-handler";
import {
  AuthorizationError,
  MalformedRecordError,
  NotFoundError,
  UnexpectedHarvestError
} from "../../src/core/errors/harvest.errors";

describe("harvest.error-handler", () => {
  it("classifies MalformedRecordError as skip with a structured log payload", () => {
    const decision = classifyRecordFailure(new MalformedRecordError("Invalid record: missing login"), {
      target: "contributors:octocat/hello-world",
      page: 2,
      index: 7
    });

    expect(decision).toEqual({
      action: "skip",
      code: "invalid_record",
      log: {
        event: "harvest.record_skipped",
        code: "invalid_record",
        reason: "Invalid record: missing login",
        target: "contributors:octocat/hello-world",
        page: 2,
        index: 7
      }
    });
  });

  it("passes harvest errors through as fatal", () => {
    const error = new AuthorizationError({ message: "GitHub rejected the credential: 401" });
    const decision = classifyRecordFailure(error, { target: "followers:octocat" });

    expect(decision).toEqual({ action: "fail", error });
  });

  it("wraps unknown errors with their page for context", () => {
    const decision = classifyRecordFailure(new TypeError("cannot read x"), { target: "forks:octocat", page: 4 });

    expect(decision.action).toBe("fail");
    if (decision.action === "fail") {
      expect(decision.error).toBeInstanceOf(UnexpectedHarvestError);
      expect(decision.error.code).toBe("unexpected");
      expect(decision.error.message).toBe("Unexpected harvest failure at page=4: cannot read x");
      expect(decision.error.cause).toBeInstanceOf(TypeError);
    }
  });

  it("drops a follower whose profile is gone", () => {
    const decision = classifyDetailFailure(
      new NotFoundError({ message: "GitHub resource not found: 404", context: { status: 404 } }),
      { target: "followers:octocat", login: "ghost" }
    );

    expect(decision).toEqual({
      action: "skip",
      code: "detail_not_found",
      log: {
        event: "harvest.record_skipped",
        code: "detail_not_found",
        reason: "GitHub resource not found: 404",
        target: "followers:octocat",
        login: "ghost"
      }
    });
  });

  it("treats a 404 on a listing as fatal", () => {
    const error = new NotFoundError({ message: "GitHub resource not found: 404" });
    expect(classifyRecordFailure(error, { target: "followers:octocat", page: 3 })).toEqual({ action: "fail", error });
  });

  it("keeps non-Error reasons readable", () => {
    expect(toJobFailure("boom").message).toBe("Unexpected harvest failure: boom");
  });
});
