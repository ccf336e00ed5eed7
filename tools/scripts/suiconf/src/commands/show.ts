import { DocumentController } from '@suiconf/config-engine';
import {
  type ClientDocument,
  DOCUMENT_SCOPE,
  type PrimaryDocument,
  environmentRows,
  groupRows,
  groupScope,
  identityRows,
  profileRows
} from '@suiconf/data-model';
import { type OutputLine, failed, line, succeeded } from '../output';
import { type CommandHandler, configPath, expectArgs, resolvePath } from './context';

function marker(active: boolean): string {
  return active ? '*' : ' ';
}

function primaryLines(document: PrimaryDocument): OutputLine[] {
  const lines: OutputLine[] = [];
  for (const group of groupRows(document)) {
    lines.push(line.info(`${marker(group.active)} group ${group.name}`));
    for (const profile of profileRows(document, group.name)) {
      lines.push(line.info(`    ${marker(profile.active)} profile ${profile.name} ${profile.url}`));
    }
    for (const identity of identityRows(document, groupScope(group.name))) {
      lines.push(line.info(`    ${marker(identity.active)} identity ${identity.alias} ${identity.address ?? '?'}`));
    }
  }
  return lines;
}

function clientLines(document: ClientDocument): OutputLine[] {
  return [
    ...environmentRows(document).map((env) => line.info(`${marker(env.active)} env ${env.name} ${env.url}`)),
    ...identityRows(document, DOCUMENT_SCOPE).map((key) =>
      line.info(`${marker(key.active)} key ${key.alias} ${key.address ?? '?'}`)
    )
  ];
}

/** `show [path]`: lists a config's entities, active ones starred. */
export const show: CommandHandler = async (input) => {
  const path = input.args.length > 0 ? resolvePath(input, expectArgs(input, ['path'])[0]) : configPath(input);
  const controller = new DocumentController({ keys: input.context.keys });

  const loaded = await controller.load(path);
  if (!loaded.ok) {
    return failed(loaded.error);
  }

  const document = loaded.document;
  return succeeded(
    line.success(`${path} (${controller.format})`),
    ...(document.kind === 'primary' ? primaryLines(document) : clientLines(document))
  );
};
