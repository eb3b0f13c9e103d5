import * as readline from "node:readline";
import {
  systemMessage,
  userMessage,
  type Client,
  type Message,
} from "@unillm/core";

export const SYSTEM_PROMPT = "You are a helpful assistant. Be concise.";

export interface ChatOptions {
  client: Client;
  model: string;
}

/** Send one prompt and return the reply text */
export async function ask(
  options: ChatOptions,
  prompt: string,
): Promise<string> {
  const response = await options.client.invoke(options.model, [
    systemMessage(SYSTEM_PROMPT),
    userMessage(prompt),
  ]);
  return response.content ?? "";
}

/** Interactive chat; the conversation is kept across turns */
export async function startChat(options: ChatOptions): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  let messages: Message[] = [systemMessage(SYSTEM_PROMPT)];

  console.log(
    `\n💬 ${options.client.provider} / ${options.model} — /reset clears the conversation, /exit quits\n`,
  );

  rl.setPrompt("You: ");
  rl.prompt();

  try {
    for await (const input of rl) {
      const trimmed = input.trim();
      if (trimmed === "/exit") break;
      if (trimmed === "/reset") {
        messages = [systemMessage(SYSTEM_PROMPT)];
        console.log("(conversation cleared)\n");
      } else if (trimmed) {
        messages.push(userMessage(trimmed));
        try {
          const response = await options.client.invoke(options.model, messages);
          messages.push(response);
          console.log(`\nAssistant: ${response.content ?? ""}\n`);
        } catch (err) {
          // Drop the unanswered turn so the conversation stays valid
          messages.pop();
          const message = err instanceof Error ? err.message : String(err);
          console.error(`\n❌ ${message}\n`);
        }
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
