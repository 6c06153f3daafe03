export function buildSummaryPrompt(transcript: string, maxWords: number): string {
  return `Summarize the following lecture transcript for students who missed the class.

Keep the summary under ${maxWords} words. Cover the main topics in the order they were taught,
the key definitions or formulas, and any announcements about homework, exams or deadlines.
Write plain prose without headings or bullet points.

TRANSCRIPT:
${transcript}`;
}

export function buildKeyPointsPrompt(transcript: string, maxPoints: number): string {
  return `Extract at most ${maxPoints} key points from the following lecture transcript.
Each key point is one short sentence a student could use for revision.

Respond with a JSON array of strings only, for example:
["First key point", "Second key point"]

Output ONLY valid JSON, no markdown code blocks or explanation.

TRANSCRIPT:
${transcript}`;
}

export function buildTaskExtractionPrompt(transcript: string, today: Date): string {
  return `Read the following lecture transcript and list every assignment, reading, exercise,
project or preparation the teacher asked students to do.

Today's date is ${today.toISOString().split("T")[0]}. Resolve relative deadlines ("next Monday",
"in two weeks") against it.

Respond with a JSON array in this exact format:
[
  {
    "title": "Short task title",
    "description": "What the student has to do",
    "priority": "high" | "medium" | "low",
    "due_date": "YYYY-MM-DD" or null
  }
]

Return [] when the lecture assigns nothing.
Output ONLY valid JSON, no markdown code blocks or explanation.

TRANSCRIPT:
${transcript}`;
}
