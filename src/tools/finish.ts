import type { ToolHandler } from "./types";

export function createFinishTool(): ToolHandler<"finish"> {
  return {
    kind: "finish",
    async call(argument, session) {
      const answer = argument.trim();
      session.finish(answer);
      return answer;
    },
  };
}
