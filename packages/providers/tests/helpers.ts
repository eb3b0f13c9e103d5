import type { Message, ToolSpec } from "@unillm/types";

export const WEATHER_TOOL: ToolSpec = {
  type: "function",
  function: {
    name: "get_weather",
    description: "Returns the current weather for a location.",
    parameters: {
      type: "object",
      properties: {
        location: {
          type: "string",
          description: "The location to get weather for.",
        },
      },
      required: ["location"],
      additionalProperties: false,
    },
  },
};

export const WEATHER_REPORT = JSON.stringify({
  temperature: "22°C",
  condition: "sunny",
  humidity: "60%",
});

export function greeting(): Message[] {
  return [
    { role: "system", content: "You are a helpful assistant." },
    { role: "user", content: "Say hello in exactly 3 words." },
  ];
}

export function weatherQuestion(city = "Paris"): Message[] {
  return [
    { role: "system", content: "You are a helpful weather assistant." },
    { role: "user", content: `What's the weather in ${city}?` },
  ];
}

/** Question, the model's tool call, and the tool's answer */
export function weatherRoundTrip(callId: string): Message[] {
  return [
    ...weatherQuestion("New York"),
    {
      role: "assistant",
      toolCalls: [
        {
          id: callId,
          type: "function",
          function: { name: "get_weather", arguments: '{"location":"New York"}' },
        },
      ],
    },
    {
      role: "tool",
      toolCallId: callId,
      name: "get_weather",
      content: WEATHER_REPORT,
    },
  ];
}
