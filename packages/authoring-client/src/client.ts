/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Authoring service HTTP client
 *
 * Thin wrapper around fetch() with:
 * - XML request bodies posted to http://<host>:<port>/<apiVersion>///<path>
 * - Per-request timeout
 * - Retries after transport failures
 * - Typed readers for every supported method
 */

import { createLogger, type NodeType } from '@lookswitch/data';
import type { XmlElement } from '@lookswitch/plmxml';
import { resolveAuthoringConfig } from './config.js';
import { AuthoringResponseError, AuthoringTransportError } from './errors.js';
import {
  getVersionInfoRequest,
  materialConnectToTargetsRequest,
  nodeSetVisibleRequest,
  SCENE_ROOT,
  sceneCloseRequest,
  sceneGetActiveRequest,
  sceneGetAllRequest,
  sceneGetStructureRequest,
  sceneLoadRequest,
  sceneSetActiveRequest,
  targetGetAllNamesRequest,
} from './requests.js';
import {
  parseResponseDocument,
  readConfirmation,
  readEchoes,
  readNodeDescriptors,
  readSceneNames,
  readStringList,
  readText,
  readVersion,
} from './responses.js';
import {
  LOOKUP_TABLE_MIN_VERSION,
  requestRootName,
  type AuthoringConfig,
  type AuthoringRequest,
  type ConnectOptions,
  type FetchLike,
  type MaterialAssignment,
  type NodeDescriptor,
  type SceneLoadOptions,
} from './types.js';

const log = createLogger('AuthoringClient');

/** Characters of an error body kept in error messages */
const ERROR_BODY_LIMIT = 500;

export interface AuthoringClientOptions extends Partial<AuthoringConfig> {
  /** fetch implementation, defaults to the global one */
  fetch?: FetchLike;
}

/**
 * Compare dotted version strings numerically: '2.9' < '2.15'
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map((part) => parseInt(part, 10) || 0);
  const right = b.split('.').map((part) => parseInt(part, 10) || 0);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

function describeTransportFailure(error: unknown, timeout: number): string {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return `timed out after ${timeout}ms`;
  }
  return error instanceof Error ? error.message : String(error);
}

export class AuthoringClient {
  readonly config: AuthoringConfig;
  private readonly fetchImpl: FetchLike;
  private serviceVersion: string | null = null;

  constructor(options: AuthoringClientOptions = {}) {
    const { fetch: fetchImpl, ...overrides } = options;
    this.config = resolveAuthoringConfig(overrides);
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /** API root, e.g. http://127.0.0.1:1234/v2/// */
  get baseUrl(): string {
    return `http://${this.config.host}:${this.config.port}/${this.config.apiVersion}///`;
  }

  /** Service version from the last successful version probe */
  get version(): string | null {
    return this.serviceVersion;
  }

  /** True when the probed service understands useLookUpTable */
  supportsLookUpTable(): boolean {
    return this.serviceVersion !== null && compareVersions(this.serviceVersion, LOOKUP_TABLE_MIN_VERSION) >= 0;
  }

  urlFor(request: AuthoringRequest): string {
    return `${this.baseUrl}${request.method.path}`;
  }

  /**
   * Send a request and return the root element of the response.
   * Transport failures are retried `retries` times.
   */
  async send(request: AuthoringRequest): Promise<XmlElement> {
    const url = this.urlFor(request);
    const requestName = requestRootName(request.method);
    const attempts = this.config.retries + 1;

    let response: Response | undefined;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts && !response; attempt++) {
      try {
        log.debug(`POST ${url}`, request.body, { operation: requestName });
        response = await this.fetchImpl(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/xml' },
          body: request.body,
          signal: AbortSignal.timeout(this.config.timeout),
        });
      } catch (error) {
        lastError = error;
        log.caught(`Attempt ${attempt}/${attempts} failed`, error, { operation: requestName });
      }
    }

    if (!response) {
      throw new AuthoringTransportError(
        `${requestName} to ${url} failed: ${describeTransportFailure(lastError, this.config.timeout)}`,
        url,
        { cause: lastError }
      );
    }

    const body = await response.text();

    if (!response.ok) {
      log.error(`${requestName} failed with HTTP ${response.status}`, undefined, { data: { url, body } });
      throw new AuthoringResponseError(
        `${requestName} failed with HTTP ${response.status}: ${body.slice(0, ERROR_BODY_LIMIT)}`,
        response.status,
        response.statusText,
        body
      );
    }

    const root = parseResponseDocument(body);
    if (!root) {
      throw new AuthoringResponseError(
        `${requestName} response is not readable XML: ${body.slice(0, ERROR_BODY_LIMIT)}`,
        response.status,
        response.statusText,
        body
      );
    }

    log.debug(`Response to ${requestName}`, body.length < 2000 ? body : `${body.length} characters`);
    return root;
  }

  /**
   * Probe the service. Throws AuthoringResponseError when the answer holds
   * no version number.
   */
  async getVersionInfo(): Promise<string> {
    const root = await this.send(getVersionInfoRequest());
    const version = readVersion(root);
    if (version === null) {
      throw new AuthoringResponseError('GetVersionInfoRequest returned no version number', 200, 'OK');
    }
    this.serviceVersion = version;
    log.info(`Connected to authoring service ${version}`);
    return version;
  }

  /** True if the service echoed the requested state for every node */
  async setVisible(nodes: readonly NodeDescriptor[], visible: boolean): Promise<boolean> {
    return readEchoes(await this.send(nodeSetVisibleRequest(nodes, visible)), visible);
  }

  /** True if every assignment was confirmed */
  async connectMaterials(assignments: readonly MaterialAssignment[], options: ConnectOptions = {}): Promise<boolean> {
    return readEchoes(await this.send(materialConnectToTargetsRequest(assignments, options)), true);
  }

  /** Names of every material target loaded in the scene */
  async getAllTargetNames(): Promise<string[]> {
    return readStringList(await this.send(targetGetAllNamesRequest()));
  }

  async getSceneStructure(
    start: NodeDescriptor = SCENE_ROOT,
    types: readonly NodeType[] = []
  ): Promise<NodeDescriptor[]> {
    return readNodeDescriptors(await this.send(sceneGetStructureRequest(start, types)));
  }

  async listScenes(): Promise<string[]> {
    return readSceneNames(await this.send(sceneGetAllRequest()));
  }

  async getActiveScene(): Promise<string | null> {
    return readText(await this.send(sceneGetActiveRequest()));
  }

  async setActiveScene(name: string): Promise<boolean> {
    return readEchoes(await this.send(sceneSetActiveRequest(name)), true);
  }

  async loadScene(path: string, options: SceneLoadOptions = {}): Promise<boolean> {
    return readConfirmation(await this.send(sceneLoadRequest(path, options)));
  }

  async closeScene(name: string): Promise<boolean> {
    return readEchoes(await this.send(sceneCloseRequest(name)), true);
  }
}
