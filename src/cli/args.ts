/**
 * Flag parsing shared by the app launchers.
 */

export interface AppArgs {
  help: boolean;
  port?: number;
  host?: string;
  config?: string;
}

function valueOf(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${flag} needs a value`);
  }
  return value;
}

export function parseAppArgs(args: string[]): AppArgs {
  const port = valueOf(args, '--port');
  const parsedPort = port === undefined ? undefined : Number.parseInt(port, 10);
  if (parsedPort !== undefined && (!Number.isInteger(parsedPort) || parsedPort < 0 || parsedPort > 65535)) {
    throw new Error(`Invalid port: ${port}`);
  }

  return {
    help: args.includes('--help') || args.includes('-h'),
    port: parsedPort,
    host: valueOf(args, '--host'),
    config: valueOf(args, '--config'),
  };
}
