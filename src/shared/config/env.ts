export type Env = {
  GITHUB_TOKEN: string;
  GITHUB_USERNAME?: string;
  GITHUB_API_URL: string;
  MONGO_URI?: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const optionalTrimmed = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

/**
 * An empty GITHUB_TOKEN is allowed: requests then go out unauthenticated,
 * under GitHub's much smaller anonymous quota.
 */
export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const GITHUB_TOKEN = env.GITHUB_TOKEN?.trim() ?? "";
  const GITHUB_USERNAME = optionalTrimmed(env.GITHUB_USERNAME);
  const GITHUB_API_URL = validateHttpUrl("GITHUB_API_URL", env.GITHUB_API_URL ?? "https://api.github.com");
  const MONGO_URI = optionalTrimmed(env.MONGO_URI);

  return { GITHUB_TOKEN, GITHUB_USERNAME, GITHUB_API_URL, MONGO_URI };
};
