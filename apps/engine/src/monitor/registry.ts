import type { CheckResult } from '@pulsewatch/records';

import type { CheckDefinition } from '../schemas/checks';
import { runHttpCheck } from './http';
import { runKnowledgeCheck } from './knowledge';
import { runRetrieveCheck } from './retrieve';
import type { ExecutionContext } from './types';
import { runWebhookCheck } from './webhook';

/** Single dispatch point over the closed set of check types. */
export function executeCheck(definition: CheckDefinition, ctx: ExecutionContext): Promise<CheckResult[]> {
  switch (definition.type) {
    case 'http':
      return runHttpCheck(definition, ctx);
    case 'retrieve':
      return runRetrieveCheck(definition, ctx);
    case 'knowledge':
      return runKnowledgeCheck(definition, ctx);
    case 'webhook':
      return runWebhookCheck(definition, ctx);
  }
}
