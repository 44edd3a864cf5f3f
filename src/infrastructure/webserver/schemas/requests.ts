// src/infrastructure/webserver/schemas/requests.ts
import { z } from 'zod';

export const parseInvoiceRequestSchema = z.object({
    documentUri: z.string().trim().min(1, 'documentUri is required'),
});

export const runWorkflowRequestSchema = z.object({
    workflow: z.string().trim().min(1, 'workflow is required'),
    task: z.record(z.string(), z.unknown()).default({}),
});

export type ParseInvoiceRequest = z.infer<typeof parseInvoiceRequestSchema>;
export type RunWorkflowRequest = z.infer<typeof runWorkflowRequestSchema>;
