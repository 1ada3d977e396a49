import { Langfuse } from "langfuse";
import { createLangfuseTracer, noopTracer } from "../telemetry/langfuse";

const mockGenerationEnd = jest.fn();
const mockTraceUpdate = jest.fn();
const mockGeneration = jest.fn(() => ({ end: mockGenerationEnd }));
const mockTrace = jest.fn(() => ({ generation: mockGeneration, update: mockTraceUpdate }));
const mockFlushAsync = jest.fn(async () => undefined);

jest.mock("langfuse", () => ({
  Langfuse: jest.fn(() => ({ trace: mockTrace, flushAsync: mockFlushAsync })),
}));

const KEYS = { publicKey: "pk-test", secretKey: "test-secret", baseUrl: "http://localhost:3001" };

describe("createLangfuseTracer", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it("returns the no-op tracer without keys", async () => {
    const tracer = createLangfuseTracer(undefined);
    expect(tracer).toBe(noopTracer);
    await expect(tracer.generation("g", async () => 7)).resolves.toBe(7);
    expect(Langfuse).not.toHaveBeenCalled();
  });

  it("builds the client from the configured keys", () => {
    createLangfuseTracer(KEYS);
    expect(Langfuse).toHaveBeenCalledWith(KEYS);
  });

  it("ends the generation with the output on success", async () => {
    const tracer = createLangfuseTracer(KEYS);

    const result = await tracer.generation("section:risks", async () => "body", {
      model: "gemini-2.5-flash",
      input: "prompt",
    });

    expect(result).toBe("body");
    expect(mockTrace).toHaveBeenCalledWith({ name: "section:risks", metadata: undefined });
    expect(mockGeneration).toHaveBeenCalledWith({
      name: "section:risks",
      model: "gemini-2.5-flash",
      input: "prompt",
    });
    expect(mockGenerationEnd).toHaveBeenCalledWith({ output: "body" });
    expect(mockTraceUpdate).toHaveBeenCalledWith({ output: "success" });
  });

  it("ends the generation at ERROR level and rethrows on failure", async () => {
    const tracer = createLangfuseTracer(KEYS);

    await expect(
      tracer.generation("section:risks", async () => {
        throw new Error("quota exceeded");
      })
    ).rejects.toThrow("quota exceeded");

    expect(mockGenerationEnd).toHaveBeenCalledWith({
      level: "ERROR",
      statusMessage: "quota exceeded",
    });
    expect(mockTraceUpdate).toHaveBeenCalledWith({ output: "error: quota exceeded" });
  });

  it("flush never rejects", async () => {
    mockFlushAsync.mockRejectedValueOnce(new Error("offline"));
    const tracer = createLangfuseTracer(KEYS);
    await expect(tracer.flush()).resolves.toBeUndefined();
    expect(mockFlushAsync).toHaveBeenCalledTimes(1);
  });
});
