import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';

import { InvalidWorkflowDefinitionError, WorkflowDefinitionNotFoundError } from '../../../core/common/errors';
import { createSilentLogger, createTestConfig } from '../../../test/fakes';
import { JsonWorkflowDefinitionSource } from '../json-workflow-definition.source';

describe('JsonWorkflowDefinitionSource', () => {
    let directory: string;
    let source: JsonWorkflowDefinitionSource;

    beforeEach(async () => {
        directory = await mkdtemp(path.join(os.tmpdir(), 'workflow-source-'));
        source = new JsonWorkflowDefinitionSource(createSilentLogger(), createTestConfig({ workflows: { directory } }));
    });

    afterEach(async () => {
        await rm(directory, { recursive: true, force: true });
    });

    it('loads steps in file order and drops unknown fields', async () => {
        await writeFile(path.join(directory, 'expense_intake.json'), JSON.stringify({
            name: 'Expense intake',
            steps: [
                { id: 'parse_invoice_input', description: 'Read the receipt' },
                { id: 'parse_invoice_input', input: 'statement' },
                { id: 'notify_approver', owner: 'finance' },
            ],
        }));

        await expect(source.load('expense_intake')).resolves.toEqual({
            name: 'Expense intake',
            steps: [
                { id: 'parse_invoice_input' },
                { id: 'parse_invoice_input', input: 'statement' },
                { id: 'notify_approver' },
            ],
        });
    });

    it('names the definition after the file and defaults to no steps', async () => {
        await writeFile(path.join(directory, 'empty.json'), '{}');

        await expect(source.load('empty')).resolves.toEqual({ name: 'empty', steps: [] });
    });

    it('reports a missing file as not found', async () => {
        await expect(source.load('absent')).rejects.toThrow(new WorkflowDefinitionNotFoundError('absent'));
    });

    it('treats path-like names as not found', async () => {
        await expect(source.load('../outside')).rejects.toBeInstanceOf(WorkflowDefinitionNotFoundError);
    });

    it('rejects a file that is not JSON', async () => {
        await writeFile(path.join(directory, 'broken.json'), '{ steps: ');

        const failure = source.load('broken');

        await expect(failure).rejects.toBeInstanceOf(InvalidWorkflowDefinitionError);
        await expect(failure).rejects.toThrow(/^Invalid workflow definition "broken": not valid JSON/);
    });

    it('rejects steps without an id', async () => {
        await writeFile(path.join(directory, 'anonymous.json'), JSON.stringify({ steps: [{ description: 'no id' }] }));

        await expect(source.load('anonymous')).rejects.toThrow(/^Invalid workflow definition "anonymous": steps\.0\.id: /);
    });
});
