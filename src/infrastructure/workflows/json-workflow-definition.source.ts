// src/infrastructure/workflows/json-workflow-definition.source.ts
import { readFile } from 'fs/promises';
import path from 'path';
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';
import { z } from 'zod';

import { AppConfig, CONFIG_TOKEN } from '../../config';
import { InvalidWorkflowDefinitionError, WorkflowDefinitionNotFoundError } from '../../core/common/errors';
import { IWorkflowDefinitionSource } from '../../core/common/interfaces/collaborators';
import { WorkflowDefinition, WorkflowStep } from '../../core/common/interfaces/models';
import { LOGGER_TOKEN } from '../logger';

const WORKFLOW_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

// Extra step fields (descriptions, owner hints...) are allowed and dropped.
const workflowStepSchema = z.object({
    id: z.string().min(1),
    input: z.string().min(1).optional(),
});

const workflowFileSchema = z.object({
    name: z.string().min(1).optional(),
    steps: z.array(workflowStepSchema).default([]),
});

function isMissingFileError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Loads workflow definitions from `<workflowDir>/<name>.json`.
 */
@injectable()
export class JsonWorkflowDefinitionSource implements IWorkflowDefinitionSource {

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: Logger,
        @inject(CONFIG_TOKEN) private readonly config: AppConfig
    ) {
        this.logger.info(`JsonWorkflowDefinitionSource reading from ${config.workflows.directory}`);
    }

    async load(name: string): Promise<WorkflowDefinition> {
        // Names map straight onto file names, so anything path-like is unknown.
        if (!WORKFLOW_NAME_PATTERN.test(name)) {
            throw new WorkflowDefinitionNotFoundError(name);
        }

        const filePath = path.join(this.config.workflows.directory, `${name}.json`);
        let contents: string;
        try {
            contents = await readFile(filePath, 'utf-8');
        } catch (error) {
            if (isMissingFileError(error)) {
                throw new WorkflowDefinitionNotFoundError(name);
            }
            throw new InvalidWorkflowDefinitionError(name, error instanceof Error ? error.message : String(error));
        }

        let json: unknown;
        try {
            json = JSON.parse(contents);
        } catch (error) {
            throw new InvalidWorkflowDefinitionError(name, `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
        }

        const parsed = workflowFileSchema.safeParse(json);
        if (!parsed.success) {
            const detail = parsed.error.issues
                .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('; ');
            throw new InvalidWorkflowDefinitionError(name, detail);
        }

        const steps: WorkflowStep[] = parsed.data.steps.map(step =>
            step.input === undefined ? { id: step.id } : { id: step.id, input: step.input }
        );
        this.logger.debug(`Loaded workflow "${name}" with ${steps.length} step(s).`);
        return { name: parsed.data.name ?? name, steps };
    }
}
