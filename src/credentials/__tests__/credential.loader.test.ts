/**
 * Tests for credential file merging and job backfill.
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { backfillCredentials, loadCredentials } from "../credential.loader";
import { CredentialNotFoundError } from "../../shared/errors/scrape.errors";

describe("loadCredentials", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "credentials-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function write(name: string, content: string): Promise<void> {
    await fs.writeFile(path.join(dir, name), content, "utf8");
  }

  it("merges files in order with later files winning", async () => {
    await write("a.json", JSON.stringify({
      "one@example.com": { password: "test-secret-1", entity_name: "One" },
      "two@example.com": { password: "test-secret-2" },
    }));
    await write("b.json", JSON.stringify({ "one@example.com": { password: "test-secret-3" } }));

    const credentials = await loadCredentials(["a.json", "b.json"], dir);

    expect(credentials).toEqual({
      "one@example.com": { password: "test-secret-3" },
      "two@example.com": { password: "test-secret-2" },
    });
  });

  it("skips missing, malformed and invalid files", async () => {
    await write("broken.json", "{ not json");
    await write("nested.json", JSON.stringify({ "x@example.com": { password: { deep: true } } }));
    await write("good.json", JSON.stringify({ "ok@example.com": { password: "test-secret" } }));

    const credentials = await loadCredentials(["missing.json", "broken.json", "nested.json", "good.json"], dir);

    expect(credentials).toEqual({ "ok@example.com": { password: "test-secret" } });
  });
});

describe("backfillCredentials", () => {
  const lookup = async () => ({
    "ops@example.com": { password: "test-secret", entity_name: "Stored Name", entity_type: "Producer" },
  });

  it("adds only the keys the job lacks", async () => {
    const job = await backfillCredentials({ email: "ops@example.com", entity_name: "Given Name" }, lookup);

    expect(job).toEqual({
      email: "ops@example.com",
      entity_name: "Given Name",
      password: "test-secret",
      entity_type: "Producer",
    });
  });

  it("replaces empty values", async () => {
    const job = await backfillCredentials({ email: "ops@example.com", password: "", entity_type: null }, lookup);

    expect(job.password).toBe("test-secret");
    expect(job.entity_type).toBe("Producer");
  });

  it("throws when the email is unknown", async () => {
    await expect(backfillCredentials({ email: "nobody@example.com" }, lookup)).rejects.toThrow(
      new CredentialNotFoundError("nobody@example.com")
    );
  });
});
