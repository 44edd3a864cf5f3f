// src/infrastructure/webserver/routes/workflow.routes.ts
import { Router } from 'express';
import { WorkflowController } from '../controllers/workflow.controller';

export function createWorkflowRouter(controller: WorkflowController): Router {
    const router = Router();

    router.post('/run', controller.handleRun);
    router.get('/:name', controller.handleDescribe);

    return router;
}
