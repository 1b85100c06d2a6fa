export type CliCommand =
  | { kind: "host" }
  | { kind: "join"; filter: string | null }
  | { kind: "scan" }
  | { kind: "help" };

export const USAGE = `Usage: audio-link <command>

Commands:
  host            wait for a peer to connect
  join [filter]   connect to the first host whose name or address contains filter
  scan            list hosts nearby
  help            show this message

Keys while connected: m = mute/unmute, q = quit`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/** Parses `process.argv.slice(2)` */
export function parseCliArgs(args: readonly string[]): CliCommand {
  const [command, ...rest] = args;

  switch (command) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { kind: "help" };
    case "host":
    case "scan":
      if (rest.length > 0) throw new CliUsageError(`"${command}" takes no arguments`);
      return { kind: command };
    case "join": {
      if (rest.length > 1) throw new CliUsageError(`"join" takes at most one filter`);
      const filter = rest[0]?.trim();
      return { kind: "join", filter: filter ? filter : null };
    }
    default:
      throw new CliUsageError(`Unknown command "${command}"`);
  }
}

/** Case-insensitive match on the peer's name or address */
export function matchesFilter(
  peer: { address: string; name?: string },
  filter: string | null,
): boolean {
  if (!filter) return true;
  const needle = filter.toLowerCase();
  return (
    peer.address.toLowerCase().includes(needle) ||
    (peer.name?.toLowerCase().includes(needle) ?? false)
  );
}
