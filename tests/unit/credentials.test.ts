/**
 * Unit tests for service account resolution.
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from "vitest";
import { JWT } from "google-auth-library";
import {
  DEFAULT_SCOPES,
  SERVICE_ACCOUNT_FILE_ENV,
  assertKeyFile,
  credentialsFromKey,
  envOr,
  loadServiceAccountKey,
  resolveCredentials,
  resolveServiceAccountFile,
} from "../../src";
import {
  TEST_KEY,
  makeTempDir,
  removeTempDir,
  writeKeyFile,
} from "../helpers/session";

let dir: string;

beforeAll(async () => {
  dir = await makeTempDir();
});

afterAll(async () => {
  await removeTempDir(dir);
});

afterEach(() => {
  delete process.env[SERVICE_ACCOUNT_FILE_ENV];
});

describe("envOr", () => {
  it("returns the parameter when given", () => {
    process.env[SERVICE_ACCOUNT_FILE_ENV] = "/from/env.json";
    expect(envOr("/param.json", SERVICE_ACCOUNT_FILE_ENV, "missing")).toBe("/param.json");
  });

  it("falls back to the environment variable", () => {
    process.env[SERVICE_ACCOUNT_FILE_ENV] = "/from/env.json";
    expect(envOr(undefined, SERVICE_ACCOUNT_FILE_ENV, "missing")).toBe("/from/env.json");
  });

  it("throws the given message when neither is set", () => {
    expect(() => envOr(undefined, SERVICE_ACCOUNT_FILE_ENV, "missing")).toThrow("missing");
  });

  it("keeps an empty value instead of falling back", () => {
    process.env[SERVICE_ACCOUNT_FILE_ENV] = "/from/env.json";
    expect(envOr("", SERVICE_ACCOUNT_FILE_ENV, "missing")).toBe("");
  });

  it("treats an empty environment variable as unset", () => {
    process.env[SERVICE_ACCOUNT_FILE_ENV] = "";
    expect(() => envOr(undefined, SERVICE_ACCOUNT_FILE_ENV, "missing")).toThrow("missing");
  });
});

describe("resolveServiceAccountFile", () => {
  it("prefers the explicit path", () => {
    process.env[SERVICE_ACCOUNT_FILE_ENV] = "/from/env.json";
    expect(resolveServiceAccountFile("/explicit.json")).toBe("/explicit.json");
  });

  it("falls back to GOOGLE_DOCUMENT_SERVICE_JSON", () => {
    process.env[SERVICE_ACCOUNT_FILE_ENV] = "/from/env.json";
    expect(resolveServiceAccountFile()).toBe("/from/env.json");
  });

  it("throws when neither is set", () => {
    expect(() => resolveServiceAccountFile()).toThrow(
      "Google Documents service account file not found. " +
        "You should specify it explicitly or in the " +
        "$GOOGLE_DOCUMENT_SERVICE_JSON environment variable."
    );
  });
});

describe("assertKeyFile", () => {
  it("accepts a regular file", async () => {
    const path = await writeKeyFile(dir);
    await expect(assertKeyFile(path)).resolves.toBeUndefined();
  });

  it("rejects directories and missing paths", async () => {
    await expect(assertKeyFile(dir)).rejects.toThrow(`\`${dir}\` is not a file`);
    await expect(assertKeyFile(`${dir}/missing.json`)).rejects.toThrow(
      `\`${dir}/missing.json\` is not a file`
    );
  });
});

describe("loadServiceAccountKey", () => {
  it("parses a key file", async () => {
    const path = await writeKeyFile(dir);
    await expect(loadServiceAccountKey(path)).resolves.toEqual(TEST_KEY);
  });

  it("rejects invalid JSON", async () => {
    const path = await writeKeyFile(dir, "{not json", "broken.json");
    await expect(loadServiceAccountKey(path)).rejects.toThrow(
      `Service account file \`${path}\` is not valid JSON`
    );
  });

  it("rejects keys without client_email or private_key", async () => {
    const path = await writeKeyFile(
      dir,
      { client_email: "robot@test-project.iam.gserviceaccount.com" },
      "partial.json"
    );
    await expect(loadServiceAccountKey(path)).rejects.toThrow(
      `Service account file \`${path}\` must contain client_email and private_key`
    );
  });
});

describe("credentialsFromKey", () => {
  it("creates a JWT with the default Drive scope", () => {
    const auth = credentialsFromKey(TEST_KEY);
    expect(auth).toBeInstanceOf(JWT);
    expect(auth.email).toBe(TEST_KEY.client_email);
    expect(auth.key).toBe(TEST_KEY.private_key);
    expect(auth.scopes).toEqual(DEFAULT_SCOPES);
  });

  it("uses the given scopes", () => {
    const scopes = ["https://www.googleapis.com/auth/spreadsheets"];
    expect(credentialsFromKey(TEST_KEY, scopes).scopes).toEqual(scopes);
  });
});

describe("resolveCredentials", () => {
  it("loads the key file named by the environment", async () => {
    const path = await writeKeyFile(dir, TEST_KEY, "env-key.json");
    process.env[SERVICE_ACCOUNT_FILE_ENV] = path;

    const credentials = await resolveCredentials();

    expect(credentials.keyFile).toBe(path);
    expect(credentials.key).toEqual(TEST_KEY);
    expect(credentials.auth.email).toBe(TEST_KEY.client_email);
  });

  it("rejects a path that is not a file", async () => {
    await expect(resolveCredentials({ keyFile: dir })).rejects.toThrow(
      `\`${dir}\` is not a file`
    );
  });
});
