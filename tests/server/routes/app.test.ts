import { startTestApp, TestClient, type TestContext } from "../../support/testApp";

describe("app", () => {
  let ctx: TestContext;
  let client: TestClient;

  beforeAll(async () => {
    ctx = await startTestApp();
    client = new TestClient(ctx.baseUrl);
  });

  afterAll(async () => {
    await ctx.close();
  });

  it("answers the root route", async () => {
    const res = await client.get("/");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "success",
      message: "Classroom Assistant API is running",
      version: "1.0.0",
    });
  });

  it("reports health", async () => {
    const res = await client.get("/api/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "healthy",
      database: "connected",
      storage: { provider: "memory", available: true },
      processor: { running: false },
      environment: "test",
    });
  });

  it("answers unknown API routes with 404", async () => {
    const res = await client.get("/api/nothing-here");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Endpoint not found" });
  });

  it("rejects malformed JSON with 400", async () => {
    const res = await fetch(`${ctx.baseUrl}/api/auth/login`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toHaveProperty("error");
  });

  it("reflects allowed origins", async () => {
    const res = await fetch(`${ctx.baseUrl}/api/health`, { headers: { origin: "http://localhost:3000" } });
    expect(res.headers.get("access-control-allow-origin")).toBe("http://localhost:3000");
    expect(res.headers.get("access-control-allow-credentials")).toBe("true");
  });

  it("does not reflect other origins", async () => {
    const res = await fetch(`${ctx.baseUrl}/api/health`, { headers: { origin: "https://evil.test" } });
    expect(res.headers.get("access-control-allow-origin")).toBeNull();
  });

  it("answers preflight requests with 204", async () => {
    const res = await fetch(`${ctx.baseUrl}/api/lectures`, {
      method: "OPTIONS",
      headers: { origin: "http://localhost:8081" },
    });
    expect(res.status).toBe(204);
    expect(res.headers.get("access-control-allow-methods")).toBe("GET, POST, PATCH, PUT, DELETE, OPTIONS");
  });

  it("exports metrics as text", async () => {
    const res = await client.get("/api/metrics");
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toMatch(/^text\/plain/);
    expect((await res.text()).split("\n")).toContain("# TYPE lectures_processed_total counter");
  });
});
