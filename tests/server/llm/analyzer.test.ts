import { AnalyzerError, CompletionAnalyzer } from "../../../server/llm/analyzer";
import type { Completion, CompletionOptions } from "../../../server/llm/types";

function recordingCompletion(reply: string) {
  const calls: Array<{ prompt: string; options: CompletionOptions }> = [];
  const complete: Completion = async (prompt, options) => {
    calls.push({ prompt, options });
    return reply;
  };
  return { complete, calls };
}

describe("CompletionAnalyzer", () => {
  it("summarizes with the word limit in the prompt", async () => {
    const { complete, calls } = recordingCompletion("  A short summary.  ");
    const analyzer = new CompletionAnalyzer("gemini", complete);

    await expect(analyzer.summarize("transcript text", 120)).resolves.toBe("A short summary.");
    expect(calls).toHaveLength(1);
    expect(calls[0].prompt).toContain("Keep the summary under 120 words.");
    expect(calls[0].prompt).toContain("TRANSCRIPT:\ntranscript text");
    expect(calls[0].options).toEqual({ maxTokens: 1024 });
  });

  it("rejects an empty summary", async () => {
    const analyzer = new CompletionAnalyzer("groq", recordingCompletion("   ").complete);
    await expect(analyzer.summarize("text")).rejects.toThrow("LLM returned an empty summary");
  });

  it("extracts key points", async () => {
    const { complete, calls } = recordingCompletion('["One", "Two", "Three"]');
    const analyzer = new CompletionAnalyzer("gemini", complete);

    await expect(analyzer.extractKeyPoints("text", 2)).resolves.toEqual(["One", "Two"]);
    expect(calls[0].prompt).toContain("Extract at most 2 key points");
  });

  it("puts today's date in the task prompt", async () => {
    const { complete, calls } = recordingCompletion('[{"title": "Worksheet", "due_date": "2026-05-04"}]');
    const analyzer = new CompletionAnalyzer("gemini", complete, () => new Date("2026-05-01T09:00:00Z"));

    const tasks = await analyzer.extractTasks("text");

    expect(tasks).toEqual([{ title: "Worksheet", description: "", priority: "medium", dueDate: new Date("2026-05-04") }]);
    expect(calls[0].prompt).toContain("Today's date is 2026-05-01.");
    expect(calls[0].options).toEqual({ maxTokens: 2048 });
  });

  it("is unavailable without a provider", async () => {
    const analyzer = new CompletionAnalyzer(null, null);

    expect(analyzer.isAvailable()).toBe(false);
    await expect(analyzer.summarize("text")).rejects.toBeInstanceOf(AnalyzerError);
    await expect(analyzer.extractTasks("text")).rejects.toThrow(
      "No LLM provider is configured (set GEMINI_API_KEY or GROQ_API_KEY)"
    );
  });
});
