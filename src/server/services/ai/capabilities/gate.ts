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

import fs from 'fs';
import { TOOL_FAMILIES, ToolFamily } from '../types/tool';
import { CapabilitySet, capabilitySet } from '../types/capability';
import { getLogger } from 'server/lib/logger';
import { IntegrationEnv, loadIntegrationEnv } from 'shared/config';

/** A cheap local check: no network, no side effects. */
export type CapabilityProbe = () => boolean;

export type CapabilityProbes = Record<ToolFamily, CapabilityProbe>;

/**
 * Probes over credentials and local files. The environment is re-read on every
 * probe so a recheck sees reconfiguration.
 */
export function integrationProbes(
  readEnv: () => IntegrationEnv = () => loadIntegrationEnv(),
  fileExists: (filePath: string) => boolean = fs.existsSync
): CapabilityProbes {
  return {
    metrics: () => {
      const env = readEnv();
      return !!env.datadogApiKey && !!env.datadogAppKey;
    },
    incidents: () => !!readEnv().pagerDutyApiKey,
    cluster: () => {
      const env = readEnv();
      return env.k8sEnabled && fileExists(env.kubeconfigPath);
    },
    // credentials come from the AWS SDK provider chain, which cannot be checked offline
    queue: () => readEnv().sqsEnabled,
  };
}

export class CapabilityGate {
  private cached?: CapabilitySet;

  constructor(private probes: CapabilityProbes = integrationProbes()) {}

  /** Runs every family's probe; a probe that throws counts as absent. */
  probe(): CapabilitySet {
    const enabled = TOOL_FAMILIES.filter((family) => this.runProbe(family));
    const disabled = TOOL_FAMILIES.filter((family) => !enabled.includes(family));
    getLogger().info(
      `Capabilities: probed enabled=${enabled.join(',') || 'none'} disabled=${disabled.join(',') || 'none'}`
    );
    return capabilitySet(enabled);
  }

  /** The set computed on first use, held for the rest of the process. */
  current(): CapabilitySet {
    if (!this.cached) {
      this.cached = this.probe();
    }
    return this.cached;
  }

  /**
   * Re-probes and replaces the held set. Sets already handed out are not
   * touched, so a round in flight keeps the capabilities it started with.
   */
  recheck(): CapabilitySet {
    this.cached = this.probe();
    return this.cached;
  }

  private runProbe(family: ToolFamily): boolean {
    try {
      return this.probes[family]() === true;
    } catch (error) {
      getLogger().warn({ error }, `Capabilities: probe failed family=${family}`);
      return false;
    }
  }
}
