/**
 * Workflow creation and regeneration.
 *
 * A workflow is saved as a draft, handed to the code generator, and saved
 * again as `ready` with its code or `failed` with the generation error.
 * A failed regeneration of a ready workflow keeps its previous code.
 */

import { WorkflowNotFoundError } from '../domain/errors';
import {
  CreateWorkflowInput,
  Workflow,
  WorkflowStatus,
  createDraftWorkflow,
  markRegenerationFailed,
  markWorkflowFailed,
  markWorkflowReady,
} from '../domain/workflow';
import { CodeGenerator } from '../llm/code-generator';
import { Logger, logger as rootLogger } from '../logger';
import { WorkflowStore } from '../storage/store';

export interface RegenerateWorkflowInput {
  description?: string;
  context?: Record<string, unknown>;
}

export class WorkflowService {
  private readonly logger: Logger;

  constructor(
    private readonly workflows: WorkflowStore,
    private readonly generator: CodeGenerator,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child({ component: 'workflows' });
  }

  async create(input: CreateWorkflowInput): Promise<Workflow> {
    const draft = await this.workflows.save(createDraftWorkflow(input));
    this.logger.info('Workflow created', { workflowId: draft.id });
    return this.generate(draft);
  }

  async get(id: string): Promise<Workflow | null> {
    return this.workflows.getById(id);
  }

  /** Replace a workflow's code, optionally with a revised description. */
  async regenerate(id: string, input: RegenerateWorkflowInput = {}): Promise<Workflow> {
    const existing = await this.workflows.getById(id);
    if (!existing) throw new WorkflowNotFoundError(id);
    const revised: Workflow = {
      ...existing,
      description: input.description ?? existing.description,
      context: input.context ?? existing.context,
    };
    return this.generate(revised, existing);
  }

  private async generate(workflow: Workflow, previous?: Workflow): Promise<Workflow> {
    let next: Workflow;
    try {
      const code = await this.generator.generate(workflow.description, workflow.context);
      next = markWorkflowReady(workflow, code);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn('Workflow code generation failed', { workflowId: workflow.id, error: message });
      next =
        previous?.status === WorkflowStatus.Ready && previous.generatedCode !== undefined
          ? markRegenerationFailed(previous, message)
          : markWorkflowFailed(workflow, message);
    }
    return this.workflows.save(next);
  }
}
