import type { ExecutionMode } from "../../core/context.js";

export type PlannedSubtask = {
  task: string;
  // Span segment the subtask runs under; never contains a dot.
  span: string;
  complexity: number;
  mode: ExecutionMode;
};

const BUILD_SUBTASKS: readonly PlannedSubtask[] = [
  { task: "analyze_requirements", span: "analyze_requirements", complexity: 0.3, mode: "student" },
  { task: "design_architecture", span: "design_architecture", complexity: 0.6, mode: "architect" },
  { task: "implement_core", span: "implement_core", complexity: 0.8, mode: "surgeon" },
  { task: "test_and_verify", span: "test_and_verify", complexity: 0.5, mode: "firefighter" },
];

// Build goals get the four-step pipeline; anything else runs as a single learning task.
export function decomposeGoal(goal: string): PlannedSubtask[] {
  if (goal.toLowerCase().includes("build")) {
    return BUILD_SUBTASKS.map((subtask) => ({ ...subtask }));
  }
  return [{ task: goal, span: toSpanSegment(goal), complexity: 0.4, mode: "student" }];
}

export function toSpanSegment(text: string): string {
  const segment = text
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return segment || "goal";
}
