/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { configFromArguments, createProgram } from './program.js';

const samplePath = fileURLToPath(new URL('../../plmxml/test-data/sample.plmxml', import.meta.url));

function xml(root: string, inner: string): Response {
  return new Response(`<${root} xmlns="urn:authoringsystem_v2">${inner}</${root}>`, { status: 200 });
}

const responses: Record<string, (body: string) => Response> = {
  getversioninfo: () => xml('GetVersionInfoResponse', '<returnVal>2.16</returnVal>'),
  'node/set/visible': (body) =>
    xml('NodeSetVisibleResponse', `<returnVal>${body.includes('<visible>true</visible>')}</returnVal>`),
  'material/getallnames': () =>
    xml('TargetGetAllNamesResponse', '<returnVal><string>Seat_Cover</string><string>Paint_Body</string></returnVal>'),
  'material/connecttotargets': () => xml('MaterialConnectToTargetsResponse', '<returnVal>true</returnVal>'),
  'scene/get/all': () =>
    xml('SceneGetAllResponse', '<returnVal><Scene><Name>Main</Name></Scene><Scene><Name>Interior</Name></Scene></returnVal>'),
  'scene/get/active': () => xml('SceneGetActiveResponse', '<returnVal>Main</returnVal>'),
};

async function fakeFetch(url: string, init: RequestInit): Promise<Response> {
  const path = url.split('///')[1] ?? '';
  const handler = responses[path];
  return handler ? handler(typeof init.body === 'string' ? init.body : '') : new Response('not found', { status: 404 });
}

function run(...args: string[]) {
  const out: string[] = [];
  const err: string[] = [];
  let exitCode: number | undefined;

  const program = createProgram({
    io: { out: (line) => out.push(line), err: (line) => err.push(line) },
    fetch: fakeFetch,
    setExitCode: (code) => {
      exitCode = code;
    },
  });
  program.exitOverride();
  program.configureOutput({ writeOut: () => {}, writeErr: () => {} });

  const done = program.parseAsync(args, { from: 'user' });
  return {
    out,
    err,
    done,
    exitCode: () => exitCode,
  };
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('configFromArguments', () => {
  it('joins option codes with --variants', () => {
    expect(configFromArguments(['C1A', ' L0A ', ''], true)).toBe('+C1A+L0A');
  });

  it('keeps a configuration string as given', () => {
    expect(configFromArguments(['+C1A+L0A'], false)).toBe('+C1A+L0A');
  });
});

describe('lookswitch', () => {
  it('inspects a document', async () => {
    const cli = run('inspect', samplePath);
    await cli.done;

    expect(cli.out).toEqual([
      'sample.plmxml: 5 product instances, 2 with PR tags',
      'Look library: 2 material targets, 4 variants',
      'Conflict: Paint_Body variants: PB-02 - L0A; is also matching L0A+P01;',
    ]);
    expect(cli.exitCode()).toBeUndefined();
  });

  it('prints a resolution as JSON', async () => {
    const cli = run('resolve', '--variants', samplePath, 'C1A', 'L0A', 'N1B');
    await cli.done;

    expect(cli.out).toHaveLength(1);
    expect(JSON.parse(cli.out[0])).toEqual({
      config: '+C1A+L0A+N1B',
      visibleNodeIds: ['i_wheel_std'],
      invisibleNodeIds: ['i_wheel_sport'],
      activeVariants: { Seat_Cover: 'SC-02', Paint_Body: 'PB-02' },
      diagnostics: {
        notUpdatedTargets: [],
        conflictingTargets: ['Paint_Body'],
        missingNodes: [],
        missingTargets: [],
      },
    });
  });

  it('fails on an unreadable file', async () => {
    const missing = fileURLToPath(new URL('../test-data/missing.plmxml', import.meta.url));
    const cli = run('resolve', missing, '+C1A');
    await cli.done;

    expect(cli.out).toEqual([]);
    expect(cli.err).toHaveLength(1);
    expect(cli.err[0].startsWith('missing.plmxml: PLM-XML file could not be read: ENOENT')).toBe(true);
    expect(cli.exitCode()).toBe(1);
  });

  it('applies a configuration', async () => {
    const cli = run('apply', samplePath, '+C1A+L0A+N1B');
    await cli.done;

    expect(cli.out.slice(1)).toEqual([
      'Authoring service 2.16',
      'Visible     ok',
      'Invisible   ok',
      'Dummy       skipped',
      'Materials   ok',
      'Connected targets: Seat_Cover; Paint_Body',
      'Configuration applied',
    ]);
    expect(cli.exitCode()).toBeUndefined();
  });

  it('lists scenes and marks the active one', async () => {
    const cli = run('scenes');
    await cli.done;

    expect(cli.out).toEqual(['* Main', '  Interior']);
  });

  it('rejects a port that is not a number', async () => {
    const cli = run('--port', 'abc', 'scenes');
    await expect(cli.done).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });
});
