/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * lookswitch command definitions
 */

import { Command, InvalidArgumentError } from 'commander';
import { AuthoringClient, AuthoringSession, withDiagnostics, type FetchLike } from '@lookswitch/authoring-client';
import { createConfigString, resolveConfiguration, statusMessage } from '@lookswitch/configurator';
import { loadPlmXml, type PlmXmlDocument } from '@lookswitch/plmxml';
import { formatApplyOutcome, formatDocument, formatValidation, resultToJson } from './format.js';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface ProgramDeps {
  io?: CliIo;
  /** Used for every authoring service request */
  fetch?: FetchLike;
  setExitCode?: (code: number) => void;
}

interface ConnectionOptions {
  host?: string;
  port?: number;
  timeout?: number;
  retries?: number;
}

interface ConfigOptions {
  variants?: boolean;
}

interface ApplyCommandOptions extends ConfigOptions {
  validate?: boolean;
  dummy?: string;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function parseInteger(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return parsed;
  };
}

/** Build the configuration string from the command arguments */
export function configFromArguments(args: readonly string[], variants: boolean): string {
  return variants ? createConfigString(args) : args.join(' ');
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const io = deps.io ?? consoleIo;
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const program = new Command();

  program
    .name('lookswitch')
    .description('Resolve PLM-XML look libraries against product configurations and apply them')
    .version('0.1.0')
    .option('--host <host>', 'Authoring service host')
    .option('--port <port>', 'Authoring service port', parseInteger(1))
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', parseInteger(1))
    .option('--retries <count>', 'Extra attempts after a transport failure', parseInteger(0));

  const createClient = (): AuthoringClient => {
    const options = program.opts<ConnectionOptions>();
    return new AuthoringClient({
      host: options.host,
      port: options.port,
      timeout: options.timeout,
      retries: options.retries,
      fetch: deps.fetch,
    });
  };

  /** Load a document; prints the failure and returns null when unusable */
  const load = async (path: string): Promise<PlmXmlDocument | null> => {
    const document = await loadPlmXml(path);
    if (!document.isValid) {
      for (const line of formatDocument(document)) {
        io.err(line);
      }
      setExitCode(1);
      return null;
    }
    return document;
  };

  program
    .command('inspect')
    .description('Summarize a PLM-XML file: instances, look library, warnings and conflicts')
    .argument('<plmxml>', 'PLM-XML file')
    .action(async (path: string) => {
      const document = await loadPlmXml(path);
      for (const line of formatDocument(document)) {
        io.out(line);
      }
      if (!document.isValid) {
        setExitCode(1);
      }
    });

  program
    .command('resolve')
    .description('Resolve a configuration and print the result as JSON')
    .argument('<plmxml>', 'PLM-XML file')
    .argument('<config...>', 'Configuration string')
    .option('--variants', 'Treat the arguments as option codes, joined as +A+B', false)
    .action(async (path: string, args: string[], options: ConfigOptions) => {
      const document = await load(path);
      if (!document) return;

      const result = resolveConfiguration(document, configFromArguments(args, options.variants ?? false));
      io.out(JSON.stringify(resultToJson(result), null, 2));
    });

  program
    .command('apply')
    .description('Resolve a configuration and apply it to the authoring service scene')
    .argument('<plmxml>', 'PLM-XML file')
    .argument('<config...>', 'Configuration string')
    .option('--variants', 'Treat the arguments as option codes, joined as +A+B', false)
    .option('--validate', 'Check the scene against the document first', false)
    .option('--dummy <material>', 'Assign this material to every target before the configured looks')
    .action(async (path: string, args: string[], options: ApplyCommandOptions) => {
      const document = await load(path);
      if (!document) return;

      let result = resolveConfiguration(document, configFromArguments(args, options.variants ?? false));
      io.out(statusMessage(result));

      const session = new AuthoringSession(createClient());
      let sceneIds: ReadonlyMap<string, string> | undefined;

      if (options.validate) {
        const validation = await session.validate(document, { materialDummy: options.dummy });
        for (const line of formatValidation(validation)) {
          io.out(line);
        }
        if (validation.success) {
          sceneIds = validation.sceneIds;
          result = withDiagnostics(result, { missingNodes: validation.missingNodes });
        }
      }

      const outcome = await session.apply(document, result, {
        materialDummy: options.dummy,
        sceneIds,
        scenePath: path,
      });
      for (const line of formatApplyOutcome(outcome)) {
        io.out(line);
      }
      if (!outcome.success) {
        setExitCode(1);
      }
    });

  program
    .command('validate')
    .description('Compare the scene loaded in the authoring service with a PLM-XML file')
    .argument('<plmxml>', 'PLM-XML file')
    .option('--dummy <material>', 'Look for a group node with this material dummy name')
    .action(async (path: string, options: { dummy?: string }) => {
      const document = await load(path);
      if (!document) return;

      const validation = await new AuthoringSession(createClient()).validate(document, {
        materialDummy: options.dummy,
      });
      for (const line of formatValidation(validation)) {
        io.out(line);
      }
      if (!validation.success) {
        setExitCode(1);
      }
    });

  program
    .command('scenes')
    .description('List the scenes of the authoring service or activate one')
    .option('--set <name>', 'Scene to activate')
    .action(async (options: { set?: string }) => {
      const client = createClient();

      if (options.set !== undefined) {
        if (await client.setActiveScene(options.set)) {
          io.out(`Active scene: ${options.set}`);
        } else {
          io.err(`The service did not activate scene ${options.set}`);
          setExitCode(1);
        }
        return;
      }

      const scenes = await client.listScenes();
      const active = await client.getActiveScene();
      for (const scene of scenes) {
        io.out(scene === active ? `* ${scene}` : `  ${scene}`);
      }
    });

  return program;
}
