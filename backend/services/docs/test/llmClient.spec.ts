// backend/services/docs/test/llmClient.spec.ts
import { AxiosError, type AxiosAdapter } from "axios";
import { describe, it, expect } from "vitest";
import { ChatCompletionsClient } from "../src/services/llmClient";
import { FakeLlm } from "./helpers/fakeUpstreams";

const MODEL = "mistralai/Mistral-7B-Instruct-v0.1";

function setup(adapter?: AxiosAdapter) {
  const llm = new FakeLlm();
  const client = new ChatCompletionsClient({
    baseUrl: "http://llm.test/v1",
    apiKey: "test-key",
    adapter: adapter ?? llm.adapter,
  });
  return { llm, client };
}

describe("ChatCompletionsClient", () => {
  it("posts a system and a user message and trims the reply", async () => {
    const { llm, client } = setup();
    llm.reply("\n  Hello there.  \n");

    const text = await client.generateText({
      model: MODEL,
      system: "be brief",
      prompt: "say hi",
      maxTokens: 100,
      temperature: 0.2,
    });

    expect(text).toBe("Hello there.");
    expect(llm.requests).toEqual([
      {
        method: "POST",
        url: "/chat/completions",
        params: undefined,
        authorization: "Bearer test-key",
        body: {
          model: MODEL,
          messages: [
            { role: "system", content: "be brief" },
            { role: "user", content: "say hi" },
          ],
          max_tokens: 100,
          temperature: 0.2,
        },
      },
    ]);
  });

  it.each([
    ["blank content", { choices: [{ message: { content: "   " } }] }, "LLM returned an empty completion"],
    ["null content", { choices: [{ message: { content: null } }] }, "LLM returned an empty completion"],
    ["no choices", { choices: [] }, "Unexpected LLM response"],
    ["not a completion", "<html>", "Unexpected LLM response"],
  ])("rejects %s with 502", async (_label, data, message) => {
    const { llm, client } = setup();
    llm.replyRaw(data);

    await expect(
      client.generateText({ model: MODEL, system: "s", prompt: "p" })
    ).rejects.toMatchObject({ status: 502, message });
  });

  it("reports the upstream status", async () => {
    const { llm, client } = setup();
    llm.replyRaw({ error: "rate limited" }, 429);

    await expect(
      client.generateText({ model: MODEL, system: "s", prompt: "p" })
    ).rejects.toMatchObject({
      status: 502,
      message: "LLM request failed (429): Request failed with status code 429",
    });
  });

  it("reports transport errors without a response", async () => {
    const { client } = setup(async (config) => {
      throw new AxiosError("connect ECONNREFUSED", AxiosError.ERR_NETWORK, config);
    });

    await expect(
      client.generateText({ model: MODEL, system: "s", prompt: "p" })
    ).rejects.toMatchObject({
      status: 502,
      message: "LLM request failed: connect ECONNREFUSED",
    });
  });
});
