import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger, createInferenceClient } from "../src/index.js";
import { toContents, toGeminiSchema } from "../src/providers/google.js";

describe("Google provider", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const client = () =>
    createInferenceClient({
      providers: {
        google: { apiKey: "test-key", baseUrl: "http://gemini.test/v1beta" },
      },
      model: "gemini-2.5-flash",
      logger: createConsoleLogger("silent"),
    });

  it("maps functionCall parts to tool calls", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(
        JSON.stringify({
          candidates: [
            {
              content: {
                parts: [
                  {
                    functionCall: {
                      id: "fc_1",
                      name: "get_weather",
                      args: { location: "Paris" },
                    },
                  },
                  {
                    functionCall: {
                      id: "fc_2",
                      name: "calculate",
                      args: { operation: "divide", a: 10, b: 0 },
                    },
                  },
                ],
              },
              finishReason: "STOP",
            },
          ],
        }),
        { status: 200 }
      )
    );

    const response = await client().completeWithTools(
      [{ role: "user", content: "Weather in Paris and 10 / 0?" }],
      [
        {
          name: "get_weather",
          description: "Weather lookup",
          parameters: {
            type: "object",
            properties: { location: { type: "string" } },
            additionalProperties: false,
          },
        },
      ],
      { systemPrompt: "Use tools." }
    );

    expect(response).toEqual({
      kind: "tool_calls",
      calls: [
        { id: "fc_1", name: "get_weather", arguments: { location: "Paris" } },
        {
          id: "fc_2",
          name: "calculate",
          arguments: { operation: "divide", a: 10, b: 0 },
        },
      ],
      text: "",
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      "http://gemini.test/v1beta/models/gemini-2.5-flash:generateContent"
    );
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
    expect(body).toMatchObject({
      systemInstruction: { parts: [{ text: "Use tools." }] },
      tools: [
        {
          functionDeclarations: [
            {
              name: "get_weather",
              parameters: {
                type: "object",
                properties: { location: { type: "string" } },
              },
            },
          ],
        },
      ],
    });
  });

  it("gives every function call its own id", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(
        JSON.stringify({
          candidates: [
            {
              content: {
                parts: [
                  { functionCall: { id: "", name: "get_weather", args: { location: "Paris" } } },
                  { functionCall: { id: "fc", name: "get_weather", args: { location: "Rome" } } },
                  { functionCall: { id: "fc", name: "get_weather", args: { location: "Oslo" } } },
                ],
              },
            },
          ],
        }),
        { status: 200 }
      )
    );

    const response = await client().completeWithTools(
      [{ role: "user", content: "Weather in three cities?" }],
      []
    );

    const ids =
      response.kind === "tool_calls" ? response.calls.map((c) => c.id) : [];
    expect(ids[0]).toMatch(/^call_[0-9a-f]{24}$/);
    expect(ids[1]).toBe("fc");
    expect(ids[2]).toMatch(/^call_[0-9a-f]{24}$/);
    expect(new Set(ids).size).toBe(3);
  });

  it("returns text as a final answer", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(
        JSON.stringify({
          candidates: [{ content: { parts: [{ text: "It is " }, { text: "sunny." }] } }],
        }),
        { status: 200 }
      )
    );

    const response = await client().completeWithTools(
      [{ role: "user", content: "Weather?" }],
      []
    );

    expect(response).toEqual({ kind: "final_answer", text: "It is sunny." });
  });

  it("reports a response without candidates as unavailable", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ candidates: [] }), { status: 200 })
    );

    await expect(client().completePlain("hello")).rejects.toMatchObject({
      name: "RemoteUnavailableError",
      provider: "google",
    });
  });
});

describe("toGeminiSchema", () => {
  it("drops keywords Gemini rejects at any depth", () => {
    expect(
      toGeminiSchema({
        type: "object",
        additionalProperties: false,
        properties: {
          nested: { type: "object", additionalProperties: true, properties: {} },
          tags: { type: "array", items: { type: "string" } },
        },
      })
    ).toEqual({
      type: "object",
      properties: {
        nested: { type: "object", properties: {} },
        tags: { type: "array", items: { type: "string" } },
      },
    });
  });
});

describe("toContents", () => {
  it("groups consecutive tool results into one user turn", () => {
    const contents = toContents([
      { role: "user", content: "Weather and math?" },
      {
        role: "assistant",
        content: "",
        toolCalls: [
          { id: "a", name: "get_weather", arguments: { location: "Paris" } },
          { id: "b", name: "calculate", arguments: { operation: "add", a: 1, b: 2 } },
        ],
      },
      {
        role: "tool",
        toolCallId: "a",
        toolName: "get_weather",
        content: "Sunny.",
        isError: false,
      },
      {
        role: "tool",
        toolCallId: "b",
        toolName: "calculate",
        content: "3",
        isError: false,
      },
    ]);

    expect(contents).toEqual([
      { role: "user", parts: [{ text: "Weather and math?" }] },
      {
        role: "model",
        parts: [
          { functionCall: { name: "get_weather", args: { location: "Paris" } } },
          {
            functionCall: {
              name: "calculate",
              args: { operation: "add", a: 1, b: 2 },
            },
          },
        ],
      },
      {
        role: "user",
        parts: [
          {
            functionResponse: {
              name: "get_weather",
              response: { content: "Sunny.", isError: false },
            },
          },
          {
            functionResponse: {
              name: "calculate",
              response: { content: "3", isError: false },
            },
          },
        ],
      },
    ]);
  });
});
