import request from "supertest";
import { describe, expect, it, vi } from "vitest";
import { createTestApp, type TestApp } from "../helpers/testApp.js";

async function withLayersPage(testApp: TestApp): Promise<TestApp> {
  await testApp.pipeline.ingest({
    sourceUrl: "https://docs.test/layers",
    content: "# Layers\n\nTile layers hold tiles."
  });
  return testApp;
}

describe("POST /api/v1/ask", () => {
  it("answers a question and reports coverage and cited sources", async () => {
    const { app, store } = await withLayersPage(createTestApp());

    const response = await request(app)
      .post("/api/v1/ask")
      .send({ query: "How do layers work?", user_id: "user-1", conversation_id: "conv-1" });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      success: true,
      message: "Query processed successfully",
      data: {
        response: "[DOCUMENTED] Layers stack (https://docs.test/layers).",
        conversation_id: "conv-1",
        status: "answered",
        coverage: {
          counts: { documented: 1, conceptual: 0, uncertain: 0 },
          listed: {},
          documentationGap: false
        },
        sources: ["https://docs.test/layers"]
      }
    });
    expect((await store.history("conv-1", 5)).map((turn) => turn.userId)).toEqual(["user-1"]);
  });

  it("starts a new conversation when none is given", async () => {
    const { app, store } = createTestApp();

    const response = await request(app)
      .post("/api/v1/ask")
      .send({ query: "How do layers work?", user_id: "user-1", perspective: "developer" });

    expect(response.status).toBe(200);
    const conversationId: string = response.body.data.conversation_id;
    expect(conversationId).toMatch(/^[0-9a-f-]{36}$/);
    const [turn] = await store.history(conversationId, 5);
    expect(turn?.metadata.perspective).toBe("developer");
  });

  it("rejects a blank query", async () => {
    const { app, llm } = createTestApp();

    const response = await request(app).post("/api/v1/ask").send({ query: "  ", user_id: "user-1" });

    expect(response.status).toBe(400);
    expect(response.body.message).toBe("Validation failed");
    expect(response.body.details[0].path).toBe("query");
    expect(llm.completionCalls).toHaveLength(0);
  });

  it("reports a failed synthesis as a dependency failure", async () => {
    const { app } = await withLayersPage(createTestApp({ completions: [new Error("invalid request")] }));

    const response = await request(app)
      .post("/api/v1/ask")
      .send({ query: "How do layers work?", user_id: "user-1" });

    expect(response.status).toBe(502);
    expect(response.body).toEqual({
      success: false,
      message: "The answer could not be generated right now. Please try again."
    });
  });

  it("reports a failed documentation search as a dependency failure", async () => {
    const { app, llm } = createTestApp();
    llm.embedError = new Error("connection refused");

    const response = await request(app)
      .post("/api/v1/ask")
      .send({ query: "How do layers work?", user_id: "user-1" });

    expect(response.status).toBe(502);
    expect(response.body.message).toBe(
      "The documentation search is temporarily unavailable. Please try again."
    );
  });

  it("still answers when the turn cannot be stored", async () => {
    const { app, store } = await withLayersPage(createTestApp());
    vi.spyOn(store, "append").mockRejectedValue(new Error("disk full"));

    const response = await request(app)
      .post("/api/v1/ask")
      .send({ query: "How do layers work?", user_id: "user-1", conversation_id: "conv-1" });

    expect(response.status).toBe(200);
    expect(response.body.message).toBe("Query processed, but the conversation history could not be saved");
    expect(response.body.data.status).toBe("answered_unpersisted");
  });
});
