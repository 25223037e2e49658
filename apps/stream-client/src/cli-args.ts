import { parseArgs } from 'node:util';
import { SUBSCRIBE_ALL, TELEMETRY_GROUPS } from '@telemetry-relay/domain';

export const FIELD_CHOICES: readonly string[] = [SUBSCRIBE_ALL, ...TELEMETRY_GROUPS];

export interface ClientArgs {
  host: string;
  port: number;
  fields: string[];
}

export const USAGE = `Usage: stream-client [--host 127.0.0.1] [--port 5000] [--fields all|position|attitude|battery ...]`;

/**
 * `--fields` takes one or more names, either repeated (`--fields position --fields battery`)
 * or as trailing values (`--fields attitude battery`).
 */
export function parseClientArgs(argv: string[]): ClientArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      host: { type: 'string', default: '127.0.0.1' },
      port: { type: 'string', default: '5000' },
      fields: { type: 'string', multiple: true },
    },
    allowPositionals: true,
  });

  const port = Number(values.port);
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new Error(`invalid --port "${values.port}"`);
  }

  const fields = [...(values.fields ?? []), ...positionals];
  for (const field of fields) {
    if (!FIELD_CHOICES.includes(field)) {
      throw new Error(`invalid field "${field}" (choose from ${FIELD_CHOICES.join(', ')})`);
    }
  }

  return {
    host: values.host ?? '127.0.0.1',
    port,
    fields: fields.length > 0 ? fields : [SUBSCRIBE_ALL],
  };
}
