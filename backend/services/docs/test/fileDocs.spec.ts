// backend/services/docs/test/fileDocs.spec.ts
import request from "supertest";
import { describe, it, expect } from "vitest";
import { fileDocPrompt, FILE_MARKDOWN_SYSTEM_PROMPT } from "../src/services/prompts";
import { DEFAULT_COMPLETION } from "./helpers/fakeUpstreams";
import { bearerFor, buildTestContext } from "./helpers/testContext";
import { expectOK, expectStatus } from "./helpers/http";

const FILE_URL = "https://github.com/acme/widgets/blob/main/src/counter.js";
const SOURCE = "let count = 0;\n";
const OWNER = bearerFor("user-1");
const STRANGER = bearerFor("user-2");

function setup() {
  const t = buildTestContext();
  t.github.file("acme/widgets", "src/counter.js", SOURCE);
  return t;
}

describe("/file-docs", () => {
  it("needs a bearer token", async () => {
    const { app } = setup();
    const res = await expectStatus(
      request(app).post("/file-docs").send({ github_url: FILE_URL }),
      401
    );
    expect(res.body.detail).toBe("Bearer authentication is needed");
  });

  it("generates documentation in the background", async () => {
    const { app, ctx, llm, docs } = setup();
    const release = llm.pause();

    const started = await expectStatus(
      request(app)
        .post("/file-docs")
        .set("authorization", OWNER)
        .send({ github_url: FILE_URL }),
      202
    );
    expect(started.body).toEqual({
      message: "Documentation generation has been started.",
      id: "doc-1",
    });
    expect(docs.rows.get("doc-1")).toMatchObject({
      owner: "user-1",
      githubUrl: FILE_URL,
      relativePath: "src/counter.js",
      status: "STARTED",
    });

    release();
    await ctx.jobs.drain();

    const res = await expectOK(
      request(app).get("/file-docs/doc-1").set("authorization", OWNER)
    );
    expect(res.body).toEqual({
      id: "doc-1",
      github_url: FILE_URL,
      status: "COMPLETED",
      content: DEFAULT_COMPLETION,
    });
    expect(llm.requests[0].body).toEqual({
      model: "mistralai/Mixtral-8x7B-Instruct-v0.1",
      messages: [
        { role: "system", content: FILE_MARKDOWN_SYSTEM_PROMPT },
        { role: "user", content: fileDocPrompt("counter.js", SOURCE) },
      ],
    });
  });

  it("uses the model from the query string", async () => {
    const { app, ctx, llm, docs } = setup();

    await expectStatus(
      request(app)
        .post("/file-docs")
        .query({ model: "Open-Orca/Mistral-7B-OpenOrca" })
        .set("authorization", OWNER)
        .send({ github_url: FILE_URL }),
      202
    );
    await ctx.jobs.drain();

    expect(docs.rows.get("doc-1")?.model).toBe("Open-Orca/Mistral-7B-OpenOrca");
    expect(llm.requests[0].body).toMatchObject({ model: "Open-Orca/Mistral-7B-OpenOrca" });
  });

  it("rejects an unknown model", async () => {
    const { app } = setup();
    const res = await expectStatus(
      request(app)
        .post("/file-docs?model=gpt-4")
        .set("authorization", OWNER)
        .send({ github_url: FILE_URL }),
      400
    );
    expect(res.body.errors[0].path).toBe("model");
  });

  it("answers 422 without github_url", async () => {
    const { app } = setup();
    const res = await expectStatus(
      request(app).post("/file-docs").set("authorization", OWNER).send({}),
      422
    );
    expect(res.body).toMatchObject({
      title: "Unprocessable Entity",
      detail: "Required field 'github_url' is missing.",
      code: "UNPROCESSABLE_ENTITY",
    });
  });

  it("refuses folders", async () => {
    const { app, github } = setup();
    github.dir("acme/widgets", "src", [{ name: "counter.js" }]);
    const url = "https://github.com/acme/widgets/tree/main/src";

    const res = await expectStatus(
      request(app).post("/file-docs").set("authorization", OWNER).send({ github_url: url }),
      400
    );
    expect(res.body.detail).toBe(`${url} is a folder, not a file.`);
  });

  it("records a failed generation", async () => {
    const { app, ctx, llm, docs } = setup();
    llm.replyRaw({ error: "boom" }, 500);

    await expectStatus(
      request(app).post("/file-docs").set("authorization", OWNER).send({ github_url: FILE_URL }),
      202
    );
    await ctx.jobs.drain();

    const res = await expectOK(
      request(app).get("/file-docs/doc-1").set("authorization", OWNER)
    );
    expect(res.body).toEqual({
      id: "doc-1",
      github_url: FILE_URL,
      status: "FAILED",
      content: null,
    });
    expect(docs.rows.get("doc-1")?.error).toBe(
      "LLM request failed (500): Request failed with status code 500"
    );
  });

  it("hides other users' records", async () => {
    const { app, ctx } = setup();
    await request(app)
      .post("/file-docs")
      .set("authorization", OWNER)
      .send({ github_url: FILE_URL });
    await ctx.jobs.drain();

    for (const req of [
      request(app).get("/file-docs/doc-1"),
      request(app).put("/file-docs/doc-1"),
      request(app).delete("/file-docs/doc-1"),
    ]) {
      const res = await expectStatus(req.set("authorization", STRANGER), 404);
      expect(res.body.detail).toBe("Documentation with id='doc-1' not found");
    }
  });

  it("regenerates with a new model, refusing while a run is in progress", async () => {
    const { app, ctx, llm, github, docs } = setup();
    await request(app)
      .post("/file-docs")
      .set("authorization", OWNER)
      .send({ github_url: FILE_URL });
    await ctx.jobs.drain();

    const release = llm.pause();
    const res = await expectStatus(
      request(app)
        .put("/file-docs/doc-1")
        .query({ model: "meta-llama/Llama-2-7b-chat-hf" })
        .set("authorization", OWNER),
      202
    );
    expect(res.body).toEqual({
      message: "Documentation regeneration has been started.",
      id: "doc-1",
    });

    const busy = await expectStatus(
      request(app).put("/file-docs/doc-1").set("authorization", OWNER),
      400
    );
    expect(busy.body.detail).toBe(
      "Documentation is still being generated for this id, so it cannot be regenerated yet."
    );

    const busyDelete = await expectStatus(
      request(app).delete("/file-docs/doc-1").set("authorization", OWNER),
      400
    );
    expect(busyDelete.body.detail).toBe(
      "Data is still being generated for this id, so it cannot be deleted yet."
    );

    release();
    await ctx.jobs.drain();

    expect(docs.rows.get("doc-1")).toMatchObject({
      status: "COMPLETED",
      model: "meta-llama/Llama-2-7b-chat-hf",
      error: null,
    });
    // The file is fetched again for the rerun.
    expect(github.contentRequests()).toHaveLength(2);
  });

  it("deletes a finished record", async () => {
    const { app, ctx } = setup();
    await request(app)
      .post("/file-docs")
      .set("authorization", OWNER)
      .send({ github_url: FILE_URL });
    await ctx.jobs.drain();

    const res = await expectOK(
      request(app).delete("/file-docs/doc-1").set("authorization", OWNER)
    );
    expect(res.body).toEqual({
      message: "The data associated with id='doc-1' was deleted.",
      id: "doc-1",
    });

    await expectStatus(
      request(app).get("/file-docs/doc-1").set("authorization", OWNER),
      404
    );
  });
});
