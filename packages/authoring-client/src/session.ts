/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { ConfigurationResult } from '@lookswitch/configurator';
import type { PlmXmlDocument } from '@lookswitch/plmxml';
import {
  applyConfiguration,
  validateSceneVsPlmXml,
  type ApplyOptions,
  type ApplyOutcome,
  type SceneValidation,
} from './apply.js';
import type { AuthoringClient } from './client.js';

/**
 * Runs whole operations against one client strictly one after another, so
 * the requests of two apply runs never interleave.
 */
export class AuthoringSession {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  constructor(readonly client: AuthoringClient) {}

  /** Operations waiting or running */
  get pending(): number {
    return this.queued;
  }

  /**
   * Queue an operation. Its result or failure is delivered through the
   * returned promise; a failure does not stop later operations.
   */
  run<T>(operation: (client: AuthoringClient) => Promise<T>): Promise<T> {
    this.queued++;
    const result = this.tail.then(() => operation(this.client));
    const settle = (): void => {
      this.queued--;
    };
    this.tail = result.then(settle, settle);
    return result;
  }

  apply(document: PlmXmlDocument, result: ConfigurationResult, options?: ApplyOptions): Promise<ApplyOutcome> {
    return this.run((client) => applyConfiguration(client, document, result, options));
  }

  validate(document: PlmXmlDocument, options?: { materialDummy?: string }): Promise<SceneValidation> {
    return this.run((client) => validateSceneVsPlmXml(client, document, options));
  }
}
