import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { AppRuntime } from "../../src/app.js";
import { createTestRuntime } from "../helpers/create-test-runtime.js";

describe("views integration", () => {
  let runtime: AppRuntime;

  beforeEach(async () => {
    runtime = await createTestRuntime();
  });

  afterEach(async () => {
    await runtime.close();
  });

  it("serves the home, organizations and users pages as HTML", async () => {
    const pages: Array<[string, string]> = [
      ["/", "<h1>Organization Directory</h1>"],
      ["/organizations", "<h1>Organizations</h1>"],
      ["/users", "<h1>Users</h1>"]
    ];

    for (const [route, heading] of pages) {
      const response = await request(runtime.app).get(route);
      expect(response.status).toBe(200);
      expect(response.headers["content-type"]).toContain("text/html");
      expect(response.text).toContain(heading);
    }
  });
});
