import type { AgentStreamEvent, AgentStreamObserver } from "./agent";
import { formatAction } from "./actions";
import { stdout as outputStream } from "node:process";

function summarizeObservationPreview(content: string, limit = 600): string {
  if (content.length <= limit) {
    return content;
  }
  return `${content.slice(0, limit)}\n... (${content.length - limit} more characters)`;
}

export interface ConsoleStreamOptions {
  writer?: NodeJS.WritableStream;
  previewLimit?: number;
}

export function createConsoleStreamObserver(options: ConsoleStreamOptions = {}): AgentStreamObserver {
  const writer = options.writer ?? outputStream;
  const previewLimit = options.previewLimit ?? 600;

  return (event: AgentStreamEvent) => {
    switch (event.type) {
      case "turn_started": {
        writer.write(`\n=== Turn ${event.turn} ===\n`);
        break;
      }
      case "message_chunk": {
        writer.write(event.chunk);
        break;
      }
      case "message_completed": {
        if (!event.content.endsWith("\n")) {
          writer.write("\n");
        }
        break;
      }
      case "action": {
        writer.write(`\n→ ${formatAction(event.action)}\n`);
        break;
      }
      case "parse_failed": {
        writer.write("\n⚠️ No action found in the reply; asking the model to follow the format.\n");
        break;
      }
      case "source_recorded": {
        writer.write(`\nInformation source: ${event.url}\n`);
        break;
      }
      case "observation": {
        if (event.action.kind === "finish") {
          break;
        }
        const body = event.observation ? summarizeObservationPreview(event.observation, previewLimit) : "(empty)";
        writer.write(`\n← Observation ${event.turn}:\n${body}\n`);
        break;
      }
      case "run_completed": {
        if (event.finished) {
          writer.write(`\n\n✔️ Finished after ${event.turns} turn(s).\n`);
        } else {
          writer.write(`\n\n✖ Stopped after ${event.turns} turn(s) without an answer.\n`);
        }
        if (event.sources.length) {
          writer.write(`Information sources:\n${event.sources.map((url) => `- ${url}`).join("\n")}\n`);
        }
        break;
      }
    }
  };
}
