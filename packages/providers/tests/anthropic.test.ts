import { describe, it, expect, vi, beforeEach } from "vitest";
import { APIConnectionError, APIError } from "@anthropic-ai/sdk";
import { AnthropicAdapter } from "../src/anthropic.js";
import {
  MalformedToolArgumentsError,
  ProtocolError,
  ProviderRequestError,
  TransportError,
} from "../src/errors.js";
import { toAnthropicTool } from "../src/tool-schema.js";
import {
  WEATHER_REPORT,
  WEATHER_TOOL,
  greeting,
  weatherQuestion,
  weatherRoundTrip,
} from "./helpers.js";

const { createMessage } = vi.hoisted(() => ({ createMessage: vi.fn() }));

vi.mock("@anthropic-ai/sdk", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@anthropic-ai/sdk")>();
  class FakeAnthropic {
    messages = { create: createMessage };
  }
  return { ...actual, default: FakeAnthropic };
});

type StreamEvent = Record<string, unknown>;

async function* stream(events: StreamEvent[]): AsyncGenerator<StreamEvent> {
  for (const event of events) yield event;
}

const messageStart = {
  type: "message_start",
  message: {
    id: "msg_1",
    type: "message",
    role: "assistant",
    model: "claude-sonnet-4-0",
    content: [],
    stop_reason: null,
    usage: { input_tokens: 20, output_tokens: 1 },
  },
};

function messageEnd(stopReason: string, outputTokens: number): StreamEvent[] {
  return [
    {
      type: "message_delta",
      delta: { stop_reason: stopReason, stop_sequence: null },
      usage: { output_tokens: outputTokens },
    },
    { type: "message_stop" },
  ];
}

function textReply(...chunks: string[]): StreamEvent[] {
  return [
    messageStart,
    { type: "content_block_start", index: 0, content_block: { type: "text", text: "" } },
    ...chunks.map((text) => ({
      type: "content_block_delta",
      index: 0,
      delta: { type: "text_delta", text },
    })),
    { type: "content_block_stop", index: 0 },
    ...messageEnd("end_turn", 7),
  ];
}

function toolReply(fragments: string[]): StreamEvent[] {
  return [
    messageStart,
    { type: "content_block_start", index: 0, content_block: { type: "text", text: "" } },
    {
      type: "content_block_delta",
      index: 0,
      delta: { type: "text_delta", text: "Let me check." },
    },
    { type: "content_block_stop", index: 0 },
    {
      type: "content_block_start",
      index: 1,
      content_block: { type: "tool_use", id: "toolu_01", name: "get_weather", input: {} },
    },
    ...fragments.map((partial_json) => ({
      type: "content_block_delta",
      index: 1,
      delta: { type: "input_json_delta", partial_json },
    })),
    { type: "content_block_stop", index: 1 },
    ...messageEnd("tool_use", 30),
  ];
}

function createAdapter(): AnthropicAdapter {
  return new AnthropicAdapter({ apiKey: "test-key", defaultMaxTokens: 1024 });
}

describe("AnthropicAdapter", () => {
  beforeEach(() => {
    createMessage.mockReset();
  });

  it("assembles streamed text and moves system messages to the system field", async () => {
    createMessage.mockResolvedValue(stream(textReply("Hello ", "there, ", "friend!")));

    const response = await createAdapter().send({
      model: "claude-sonnet-4-0",
      messages: greeting(),
    });

    expect(response).toEqual({
      role: "assistant",
      content: "Hello there, friend!",
      model: "claude-sonnet-4-0",
      usage: { inputTokens: 20, outputTokens: 7 },
      stopReason: "end_turn",
    });

    const [params, options] = createMessage.mock.calls[0];
    expect(params).toEqual({
      model: "claude-sonnet-4-0",
      max_tokens: 1024,
      stream: true,
      system: "You are a helpful assistant.",
      messages: [{ role: "user", content: "Say hello in exactly 3 words." }],
    });
    expect(options).toEqual({ signal: undefined });
  });

  it("joins input_json_delta fragments into one tool call", async () => {
    createMessage.mockResolvedValue(
      stream(toolReply(['{"loca', 'tion": "Par', 'is"}'])),
    );

    const response = await createAdapter().send({
      model: "claude-sonnet-4-0",
      messages: weatherQuestion(),
      tools: [WEATHER_TOOL],
      toolChoice: "required",
    });

    expect(response.content).toBe("Let me check.");
    expect(response.stopReason).toBe("tool_use");
    expect(response.usage).toEqual({ inputTokens: 20, outputTokens: 30 });
    expect(response.toolCalls).toEqual([
      {
        id: "toolu_01",
        type: "function",
        function: { name: "get_weather", arguments: '{"location": "Paris"}' },
      },
    ]);

    const [params] = createMessage.mock.calls[0];
    expect(params.tools).toEqual([toAnthropicTool(WEATHER_TOOL)]);
    expect(params.tool_choice).toEqual({ type: "any" });
  });

  it("uses the block's input when no fragments arrive", async () => {
    createMessage.mockResolvedValue(stream(toolReply([])));

    const response = await createAdapter().send({
      model: "claude-sonnet-4-0",
      messages: weatherQuestion(),
      tools: [WEATHER_TOOL],
    });

    expect(response.toolCalls?.[0].function.arguments).toBe("{}");
  });

  it("maps a named tool choice", async () => {
    createMessage.mockResolvedValue(stream(textReply("ok")));

    await createAdapter().send({
      model: "claude-sonnet-4-0",
      messages: weatherQuestion(),
      tools: [WEATHER_TOOL],
      toolChoice: "get_weather",
    });

    expect(createMessage.mock.calls[0][0].tool_choice).toEqual({
      type: "tool",
      name: "get_weather",
    });
  });

  it("sends tool results as tool_result blocks and declares called tools", async () => {
    createMessage.mockResolvedValue(
      stream(textReply("It is 22°C and sunny in New York.")),
    );

    const response = await createAdapter().send({
      model: "claude-sonnet-4-0",
      messages: weatherRoundTrip("toolu_01"),
    });

    expect(response.content).toBe("It is 22°C and sunny in New York.");

    const [params] = createMessage.mock.calls[0];
    expect(params.messages).toEqual([
      { role: "user", content: "What's the weather in New York?" },
      {
        role: "assistant",
        content: [
          {
            type: "tool_use",
            id: "toolu_01",
            name: "get_weather",
            input: { location: "New York" },
          },
        ],
      },
      {
        role: "user",
        content: [
          { type: "tool_result", tool_use_id: "toolu_01", content: WEATHER_REPORT },
        ],
      },
    ]);
    expect(params.tools).toEqual([
      { name: "get_weather", input_schema: { type: "object" } },
    ]);
    expect(params.tool_choice).toEqual({ type: "none" });
  });

  it("merges consecutive tool results into one user message", async () => {
    createMessage.mockResolvedValue(stream(textReply("Both done.")));

    await createAdapter().send({
      model: "claude-sonnet-4-0",
      messages: [
        { role: "user", content: "Weather in Paris and Oslo?" },
        {
          role: "assistant",
          toolCalls: [
            {
              id: "toolu_a",
              type: "function",
              function: { name: "get_weather", arguments: '{"location":"Paris"}' },
            },
            {
              id: "toolu_b",
              type: "function",
              function: { name: "get_weather", arguments: '{"location":"Oslo"}' },
            },
          ],
        },
        { role: "tool", toolCallId: "toolu_a", name: "get_weather", content: "sunny" },
        { role: "tool", toolCallId: "toolu_b", name: "get_weather", content: "rain" },
      ],
      tools: [WEATHER_TOOL],
    });

    const [params] = createMessage.mock.calls[0];
    expect(params.messages).toHaveLength(3);
    expect(params.messages[2]).toEqual({
      role: "user",
      content: [
        { type: "tool_result", tool_use_id: "toolu_a", content: "sunny" },
        { type: "tool_result", tool_use_id: "toolu_b", content: "rain" },
      ],
    });
    expect(params).not.toHaveProperty("system");
    expect(params).not.toHaveProperty("tool_choice");
  });

  it.each([
    ["auto", { type: "auto" }],
    ["none", { type: "none" }],
    ["required", { type: "any" }],
  ])("maps tool choice %s", async (choice, expected) => {
    createMessage.mockResolvedValue(stream(textReply("ok")));

    await createAdapter().send({
      model: "claude-sonnet-4-0",
      messages: weatherQuestion(),
      tools: [WEATHER_TOOL],
      toolChoice: choice,
    });

    expect(createMessage.mock.calls[0][0].tool_choice).toEqual(expected);
  });

  it("treats an empty tool list like no tools", async () => {
    const adapter = createAdapter();

    createMessage.mockResolvedValueOnce(stream(textReply("ok")));
    await adapter.send({ model: "claude-sonnet-4-0", messages: weatherQuestion() });
    createMessage.mockResolvedValueOnce(stream(textReply("ok")));
    await adapter.send({
      model: "claude-sonnet-4-0",
      messages: weatherQuestion(),
      tools: [],
      toolChoice: "auto",
    });

    const [withoutTools] = createMessage.mock.calls[0];
    const [emptyTools] = createMessage.mock.calls[1];
    expect(emptyTools).toEqual(withoutTools);
    expect(emptyTools).not.toHaveProperty("tools");
    expect(emptyTools).not.toHaveProperty("tool_choice");
  });

  it("leaves an empty assistant reply out of the next request", async () => {
    const adapter = createAdapter();
    createMessage.mockResolvedValueOnce(stream([messageStart, ...messageEnd("end_turn", 0)]));

    const empty = await adapter.send({
      model: "claude-sonnet-4-0",
      messages: greeting(),
    });
    expect(empty.content).toBe("");

    createMessage.mockResolvedValueOnce(stream(textReply("Hello there, friend!")));
    await adapter.send({
      model: "claude-sonnet-4-0",
      messages: [...greeting(), empty, { role: "user", content: "Please answer." }],
    });

    expect(createMessage.mock.calls[1][0].messages).toEqual([
      { role: "user", content: "Say hello in exactly 3 words." },
      { role: "user", content: "Please answer." },
    ]);
  });

  it("rejects fragments that do not form a JSON object", async () => {
    createMessage.mockResolvedValue(stream(toolReply(['{"location": "Par'])));

    await expect(
      createAdapter().send({
        model: "claude-sonnet-4-0",
        messages: weatherQuestion(),
        tools: [WEATHER_TOOL],
      }),
    ).rejects.toBeInstanceOf(MalformedToolArgumentsError);
  });

  it("reports a stream cut before message_stop", async () => {
    createMessage.mockResolvedValue(stream(textReply("Hel").slice(0, 3)));

    await expect(
      createAdapter().send({ model: "claude-sonnet-4-0", messages: greeting() }),
    ).rejects.toThrow(ProtocolError);
  });

  it("maps an overloaded response to ProviderRequestError", async () => {
    createMessage.mockRejectedValue(
      new APIError(529, undefined, "Overloaded", undefined),
    );

    const err = await createAdapter()
      .send({ model: "claude-sonnet-4-0", messages: greeting() })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderRequestError);
    expect(err).toMatchObject({ provider: "anthropic", status: 529 });
  });

  it("maps connection failures to TransportError", async () => {
    createMessage.mockRejectedValue(
      new APIConnectionError({ message: "Connection error." }),
    );

    await expect(
      createAdapter().send({ model: "claude-sonnet-4-0", messages: greeting() }),
    ).rejects.toBeInstanceOf(TransportError);
  });
});
