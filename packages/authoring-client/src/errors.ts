/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/** The service could not be reached or did not answer in time */
export class AuthoringTransportError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AuthoringTransportError';
  }
}

/** The service answered with an error status or an unreadable document */
export class AuthoringResponseError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly statusText: string,
    public readonly body?: string
  ) {
    super(message);
    this.name = 'AuthoringResponseError';
  }
}
