// Manager registry: the single table of per-manager commands.
// Adding a manager means extending MANAGER_IDS in types/manager.ts; the mapped
// type below then refuses to compile until the new entry is filled in.
import type { Command } from "../types/command.js";
import type { ManagerId, PackageName } from "../types/manager.js";
import type { ElevationMethod } from "../config/schema.js";
import { type LineRule, aptRule, dnfRule, portageRule, pacmanRule, flatpakRule, snapRule, xbpsRule } from "./parsers.js";

/** Everything needed to drive one package manager. */
export interface ManagerSpec {
  readonly id: ManagerId;
  /** Binary whose `--version` answers the availability probe. */
  readonly probeBinary: string;
  readonly listInstalled: Command;
  readonly lineRule: LineRule;
  checkInstalled(pkg: PackageName): Command;
  /** Install command before elevation is applied. */
  install(pkg: PackageName): Command;
  readonly requiresElevation: boolean;
}

export const MANAGERS: { readonly [M in ManagerId]: ManagerSpec & { readonly id: M } } = {
  apt: {
    id: "apt",
    probeBinary: "apt",
    listInstalled: { argv: ["apt", "list", "--installed"] },
    lineRule: aptRule,
    checkInstalled: (pkg) => ({ argv: ["dpkg", "-s", pkg] }),
    install: (pkg) => ({ argv: ["apt", "install", "-y", pkg], env: { DEBIAN_FRONTEND: "noninteractive" } }),
    requiresElevation: true,
  },
  yum_dnf: {
    // dnf replaced yum; the id keeps both names
    id: "yum_dnf",
    probeBinary: "dnf",
    listInstalled: { argv: ["dnf", "list", "installed"] },
    lineRule: dnfRule,
    checkInstalled: (pkg) => ({ argv: ["dnf", "list", "installed", pkg] }),
    install: (pkg) => ({ argv: ["dnf", "install", "-y", pkg] }),
    requiresElevation: true,
  },
  portage: {
    id: "portage",
    probeBinary: "emerge",
    listInstalled: { argv: ["qlist", "-I"] },
    lineRule: portageRule,
    checkInstalled: (pkg) => ({ argv: ["qlist", "-I", pkg] }),
    install: (pkg) => ({ argv: ["emerge", pkg] }),
    requiresElevation: true,
  },
  pacman: {
    id: "pacman",
    probeBinary: "pacman",
    listInstalled: { argv: ["pacman", "-Q"] },
    lineRule: pacmanRule,
    checkInstalled: (pkg) => ({ argv: ["pacman", "-Q", pkg] }),
    install: (pkg) => ({ argv: ["pacman", "-S", "--noconfirm", pkg] }),
    requiresElevation: true,
  },
  flatpak: {
    id: "flatpak",
    probeBinary: "flatpak",
    listInstalled: { argv: ["flatpak", "list", "--app"] },
    lineRule: flatpakRule,
    checkInstalled: (pkg) => ({ argv: ["flatpak", "info", pkg] }),
    install: (pkg) => ({ argv: ["flatpak", "install", "-y", pkg] }),
    requiresElevation: false,
  },
  snap: {
    id: "snap",
    probeBinary: "snap",
    listInstalled: { argv: ["snap", "list"] },
    lineRule: snapRule,
    checkInstalled: (pkg) => ({ argv: ["snap", "list", pkg] }),
    install: (pkg) => ({ argv: ["snap", "install", pkg] }),
    requiresElevation: true,
  },
  xbps: {
    id: "xbps",
    probeBinary: "xbps-query",
    listInstalled: { argv: ["xbps-query", "-l"] },
    lineRule: xbpsRule,
    checkInstalled: (pkg) => ({ argv: ["xbps-query", "-S", pkg] }),
    install: (pkg) => ({ argv: ["xbps-install", "-S", "-y", pkg] }),
    requiresElevation: true,
  },
};

export function getManager(id: ManagerId): ManagerSpec {
  return MANAGERS[id];
}

export function probeCommand(id: ManagerId): Command {
  return { argv: [MANAGERS[id].probeBinary, "--version"] };
}

/**
 * Prefix a command with the elevation wrapper. The environment travels as `VAR=value` arguments.
 * Both wrappers run non-interactively (`-n`): stdin is not a terminal, so a missing credential must fail.
 */
export function elevate(command: Command, method: ElevationMethod): Command {
  const envArgs = Object.entries(command.env ?? {}).map(([key, value]) => `${key}=${value}`);
  if (method === "sudo") {
    return { ...command, argv: ["sudo", "-n", ...envArgs, ...command.argv] };
  }
  // doas has no VAR=value syntax; go through env(1)
  const argv = envArgs.length > 0
    ? ["doas", "-n", "env", ...envArgs, ...command.argv]
    : ["doas", "-n", ...command.argv];
  return { ...command, argv };
}

/** The install command exactly as it will be spawned. */
export function installCommand(id: ManagerId, pkg: PackageName, method: ElevationMethod): Command {
  const entry = MANAGERS[id];
  const command = entry.install(pkg);
  return entry.requiresElevation ? elevate(command, method) : command;
}
