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

export { FOUNDATIONS_SECTION } from './foundations';
export { METRICS_SECTION } from './metrics';
export { INCIDENTS_SECTION } from './incidents';
export { CLUSTER_SECTION } from './cluster';
export { QUEUE_SECTION } from './queue';
export { SAFETY_SECTION } from './safety';
