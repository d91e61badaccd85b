import { AbsolutePath, displayName } from "../vfs";

export interface ShellIdentity {
  user: string;
  host: string;
}

export function formatPrompt(identity: ShellIdentity, cwd: AbsolutePath): string {
  return `${identity.user}@${identity.host}:${displayName(cwd)}$ `;
}
