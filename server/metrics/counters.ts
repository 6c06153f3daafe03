/**
 * Prometheus-style Metrics Counters
 *
 * In-process counters for the lecture pipeline, exported in Prometheus text
 * format by GET /api/metrics.
 */

interface Counter {
  name: string;
  help: string;
  value: number;
}

interface CounterWithLabels {
  name: string;
  help: string;
  labelName: string;
  values: Map<string, number>;
}

const counters: Map<string, Counter> = new Map();
const labeledCounters: Map<string, CounterWithLabels> = new Map();

function defineCounter(name: string, help: string): void {
  counters.set(name, { name, help, value: 0 });
}

function defineLabeledCounter(name: string, help: string, labelName: string): void {
  labeledCounters.set(name, { name, help, labelName, values: new Map() });
}

defineCounter("lectures_processed_total", "Lectures transcribed, summarized and marked processed");
defineCounter("lecture_processing_failures_total", "Lecture processing attempts that failed and were left for retry");
defineCounter("lecture_processing_skipped_total", "Lectures skipped because transcription or analysis was unavailable");
defineCounter("transcription_requests_total", "Requests sent to the speech-to-text API");
defineCounter("tasks_extracted_total", "Tasks created from lecture transcripts");
defineCounter("notifications_created_total", "Notifications created by the processor");
defineLabeledCounter("llm_requests_total", "LLM completion requests by provider", "provider");

/**
 * Increments a counter, creating it on first use.
 */
export function incrementCounter(name: string, value: number = 1): void {
  const counter = counters.get(name);
  if (counter) {
    counter.value += value;
  } else {
    counters.set(name, { name, help: `Counter: ${name}`, value });
  }
}

export function incrementLabeledCounter(name: string, label: string, value: number = 1): void {
  let counter = labeledCounters.get(name);
  if (!counter) {
    counter = { name, help: `Labeled counter: ${name}`, labelName: "label", values: new Map() };
    labeledCounters.set(name, counter);
  }

  const current = counter.values.get(label) || 0;
  counter.values.set(label, current + value);
}

export function getCounterValue(name: string): number {
  return counters.get(name)?.value || 0;
}

export function getLabeledCounterValues(name: string): Map<string, number> {
  return labeledCounters.get(name)?.values || new Map();
}

/**
 * Resets all counters to zero. Used by tests.
 */
export function resetAllCounters(): void {
  counters.forEach((counter) => {
    counter.value = 0;
  });
  labeledCounters.forEach((counter) => {
    counter.values.clear();
  });
}

export function exportMetrics(): string {
  const lines: string[] = [];

  counters.forEach((counter) => {
    lines.push(`# HELP ${counter.name} ${counter.help}`);
    lines.push(`# TYPE ${counter.name} counter`);
    lines.push(`${counter.name} ${counter.value}`);
    lines.push("");
  });

  labeledCounters.forEach((counter) => {
    lines.push(`# HELP ${counter.name} ${counter.help}`);
    lines.push(`# TYPE ${counter.name} counter`);
    counter.values.forEach((value, label) => {
      lines.push(`${counter.name}{${counter.labelName}="${label}"} ${value}`);
    });
    lines.push("");
  });

  return lines.join("\n");
}

export function trackLectureProcessed(taskCount: number, notificationCount: number): void {
  incrementCounter("lectures_processed_total");
  incrementCounter("tasks_extracted_total", taskCount);
  incrementCounter("notifications_created_total", notificationCount);
}

export function trackLectureFailure(): void {
  incrementCounter("lecture_processing_failures_total");
}

export function trackLectureSkipped(): void {
  incrementCounter("lecture_processing_skipped_total");
}

export function trackLLMRequest(provider: string): void {
  incrementLabeledCounter("llm_requests_total", provider);
}
