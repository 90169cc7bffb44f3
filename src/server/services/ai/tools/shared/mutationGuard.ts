/**
 * Copyright 2025 GoodRx, Inc.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { AssistantError } from 'server/lib/errors/assistantErrors';
import { ToolExecutionContext } from '../../types/tool';

export type MutationGuard = Pick<ToolExecutionContext, 'allowMutation'>;

/** Backend clients call this before any write. */
export function assertMutationAllowed(guard: MutationGuard, operation: string): void {
  if (!guard.allowMutation) {
    throw new AssistantError('READ_ONLY_VIOLATION', `Refusing to ${operation}: tool is read-only`, { operation });
  }
}
