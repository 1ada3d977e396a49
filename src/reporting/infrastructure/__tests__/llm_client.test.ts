import type { AiClient } from "../../../ai/client";
import type { SectionPrompt } from "../../domain/types";
import { createLlmClient } from "../llm_client";

const PROMPT: SectionPrompt = {
  sectionName: "Risk Factors",
  system: "You are an analyst.",
  renderedText: "Write the risks.",
  sources: [],
};

function fakeAi(generateText: AiClient["generateText"]): AiClient {
  return { model: "test-model", generateText };
}

describe("createLlmClient", () => {
  test("returns trimmed text on success", async () => {
    const generateText = jest.fn(async () => "  Body text.  ");
    const client = createLlmClient({
      ai: fakeAi(generateText),
      timeoutMs: 1000,
      maxAttempts: 3,
    });

    await expect(client.generate(PROMPT)).resolves.toEqual({
      ok: true,
      data: "Body text.",
      meta: { attempts: 1 },
    });
    expect(generateText).toHaveBeenCalledWith(
      expect.objectContaining({
        system: "You are an analyst.",
        prompt: "Write the risks.",
        traceName: "section:Risk Factors",
      })
    );
  });

  test("treats empty output as a failure and retries with backoff", async () => {
    const generateText = jest
      .fn<Promise<string>, []>()
      .mockResolvedValueOnce("   ")
      .mockRejectedValueOnce(new Error("503 overloaded"))
      .mockResolvedValueOnce("Recovered");
    const delays: number[] = [];
    const client = createLlmClient({
      ai: fakeAi(generateText),
      timeoutMs: 1000,
      maxAttempts: 3,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    const result = await client.generate(PROMPT);

    expect(result).toEqual({ ok: true, data: "Recovered", meta: { attempts: 3 } });
    expect(delays).toEqual([1000, 2000]);
  });

  test("returns the failure marker after exhausting attempts", async () => {
    const generateText = jest.fn(async (): Promise<string> => {
      throw new Error("quota exceeded");
    });
    const client = createLlmClient({
      ai: fakeAi(generateText),
      timeoutMs: 1000,
      maxAttempts: 3,
      sleep: async () => undefined,
    });

    await expect(client.generate(PROMPT)).resolves.toEqual({
      ok: false,
      error: "quota exceeded",
      meta: { attempts: 3 },
    });
    expect(generateText).toHaveBeenCalledTimes(3);
  });

  test("times out a hung attempt", async () => {
    const generateText = jest.fn(() => new Promise<string>(() => undefined));
    const client = createLlmClient({
      ai: fakeAi(generateText),
      timeoutMs: 5,
      maxAttempts: 1,
    });

    await expect(client.generate(PROMPT)).resolves.toEqual({
      ok: false,
      error: "Timed out after 5ms",
      meta: { attempts: 1 },
    });
  });
});
