/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @lookswitch/authoring-client - drive a remote authoring service scene
 */

export { AuthoringClient, compareVersions } from './client.js';
export type { AuthoringClientOptions } from './client.js';

export { AuthoringSession } from './session.js';

export { applyConfiguration, validateSceneVsPlmXml, reinitializeScene } from './apply.js';
export type { ApplyOptions, ApplyOutcome, SceneValidation, StepStatus } from './apply.js';

export { resolveAuthoringConfig, DEFAULT_AUTHORING_CONFIG, AUTHORING_ENV } from './config.js';

export { AuthoringTransportError, AuthoringResponseError } from './errors.js';

export {
  buildRequest,
  escapeXml,
  nodeInfoXml,
  nodeDescriptorFromProductNode,
  SCENE_ROOT,
  getVersionInfoRequest,
  nodeSetVisibleRequest,
  materialConnectToTargetsRequest,
  targetGetAllNamesRequest,
  sceneGetStructureRequest,
  sceneGetAllRequest,
  sceneGetActiveRequest,
  sceneSetActiveRequest,
  sceneLoadRequest,
  sceneCloseRequest,
} from './requests.js';

export {
  parseResponseDocument,
  readVersion,
  readEchoes,
  readStringList,
  readSceneNames,
  readNodeDescriptors,
} from './responses.js';

export { AuthoringMethod, AUTHORING_NAMESPACE, LOOKUP_TABLE_MIN_VERSION, requestRootName } from './types.js';
export type {
  AuthoringConfig,
  AuthoringMethodName,
  AuthoringRequest,
  ConnectOptions,
  FetchLike,
  MaterialAssignment,
  MethodDescriptor,
  NodeDescriptor,
  SceneLoadOptions,
} from './types.js';

export { withDiagnostics } from '@lookswitch/configurator';
