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

import { TOOL_FAMILIES, ToolFamily } from './tool';

/**
 * Integration families usable for a round. Passed by value: a recheck builds a
 * new set instead of mutating one a session may be holding.
 */
export type CapabilitySet = ReadonlySet<ToolFamily>;

export function capabilitySet(families: Iterable<ToolFamily>): CapabilitySet {
  return new Set(families);
}

export const EMPTY_CAPABILITIES: CapabilitySet = capabilitySet([]);

export const ALL_CAPABILITIES: CapabilitySet = capabilitySet(TOOL_FAMILIES);
