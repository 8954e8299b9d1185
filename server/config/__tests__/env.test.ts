import { describe, test } from "node:test";
import assert from "node:assert/strict";

import { parseEnv } from "../env";

describe("parseEnv", () => {
  test("applies defaults for an empty environment", () => {
    const env = parseEnv({});

    assert.equal(env.NODE_ENV, "development");
    assert.equal(env.PORT, 8080);
    assert.equal(env.HOST, "0.0.0.0");
    assert.equal(env.LOG_LEVEL, "info");
    assert.equal(env.UPLOAD_SIZE_LIMIT_BYTES, 10 * 1024 * 1024);
    assert.equal(env.STRICT_UPLOAD_FORMATS, false);
    assert.equal(env.OPENAI_API_KEY, undefined);
    assert.equal(env.OPENAI_MODEL, undefined);
  });

  test("treats blank strings as unset", () => {
    const env = parseEnv({ OPENAI_API_KEY: "   ", CLIENT_ORIGIN: "" });

    assert.equal(env.OPENAI_API_KEY, undefined);
    assert.equal(env.CLIENT_ORIGIN, undefined);
  });

  test("coerces numeric and boolean settings", () => {
    const env = parseEnv({
      PORT: "3000",
      UPLOAD_SIZE_LIMIT_BYTES: "2048",
      STRICT_UPLOAD_FORMATS: "true",
      OPENAI_MODEL: " gpt-4o ",
    });

    assert.equal(env.PORT, 3000);
    assert.equal(env.UPLOAD_SIZE_LIMIT_BYTES, 2048);
    assert.equal(env.STRICT_UPLOAD_FORMATS, true);
    assert.equal(env.OPENAI_MODEL, "gpt-4o");
  });

  test("rejects invalid values", () => {
    assert.throws(() => parseEnv({ LOG_LEVEL: "verbose" }));
    assert.throws(() => parseEnv({ STRICT_UPLOAD_FORMATS: "yes" }));
    assert.throws(() => parseEnv({ PORT: "-1" }));
  });
});
