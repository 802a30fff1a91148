/**
 * Scripted decision tree served ahead of the agent pipeline
 */

import fs from 'fs';
import { z } from 'zod';

const flowStepSchema = z.object({
  id: z.string().min(1),
  prompt: z.string().min(1),
  options: z.array(z.object({
    label: z.string().min(1),
    next: z.string().min(1)
  })).default([])
});

const flowFileSchema = z.object({
  steps: z.array(flowStepSchema)
});

export type FlowStep = z.infer<typeof flowStepSchema>;

export interface FlowResolution {
  step: FlowStep;
  response: string;
  options: string[];
  nextStep: string | null;
}

export class FlowStore {
  private readonly steps: Map<string, FlowStep>;

  constructor(steps: FlowStep[]) {
    this.steps = new Map(steps.map(step => [step.id, step]));

    for (const step of steps) {
      for (const option of step.options) {
        if (!this.steps.has(option.next)) {
          throw new Error(`Flow step "${step.id}" points at unknown step "${option.next}"`);
        }
      }
    }
  }

  static fromFile(filePath: string): FlowStore {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    return new FlowStore(flowFileSchema.parse(raw).steps);
  }

  getStep(stepId: string): FlowStep | undefined {
    return this.steps.get(stepId);
  }

  /**
   * Follow the choice whose label matches `text` from `stepId`. Returns null
   * when the step is unknown or no label matches.
   */
  resolve(stepId: string, text: string): FlowResolution | null {
    const current = this.steps.get(stepId);
    if (!current) {
      return null;
    }

    const needle = text.trim().toLowerCase();
    const choice = current.options.find(option => option.label.toLowerCase() === needle);
    if (!choice) {
      return null;
    }

    const target = this.steps.get(choice.next);
    if (!target) {
      return null;
    }

    return {
      step: target,
      response: target.prompt,
      options: target.options.map(option => option.label),
      nextStep: target.options.length > 0 ? target.id : null
    };
  }

  get size(): number {
    return this.steps.size;
  }
}
