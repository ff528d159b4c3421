import {
  createBucketParser,
  createColumnParser,
  createPipeParser,
  SearchOutputParser
} from "./parser/searchOutputParsers.js";

/**
 * Everything the checker and the suggester need to know about one package
 * manager: how its commands are written in the catalog, how to ask its CLI
 * about an identifier, and how to read the answer.
 */
export interface ManagerProfile {
  /** Canonical manager key, as written on search candidates. */
  key: string;
  /** Other catalog spellings that resolve to this profile. */
  aliases: readonly string[];
  cli: string;
  /** Human name used in classifier messages. */
  label: string;
  /** Verbs accepted right after the CLI token in a catalog command. */
  verbs: readonly string[];
  /** Flag that names the identifier explicitly, e.g. `--id`. */
  idFlag?: string;
  notFoundMarkers: readonly string[];
  /** The check only passes when a result line starts with the identifier. */
  requireMatchingLine: boolean;
  successMessage: string;
  parser: SearchOutputParser;
  checkArgs(identifier: string): string[];
  searchArgs(query: string): string[];
  installCommand(identifier: string): string;
}

export const wingetProfile: ManagerProfile = {
  key: "winget",
  aliases: [],
  cli: "winget",
  label: "winget",
  verbs: ["install", "upgrade", "show", "display", "list"],
  idFlag: "--id",
  notFoundMarkers: [
    "no package found matching input criteria",
    "no packages found matching input criteria",
    "no package found matching the input criteria",
    "no application found matching input criteria",
    "no app found matching input criteria"
  ],
  requireMatchingLine: false,
  successMessage: "winget show located the package.",
  parser: createColumnParser({
    manager: "winget",
    emptyMarkers: ["no package found matching input criteria"],
    metadataColumns: ["version", "source"]
  }),
  checkArgs: (identifier) => [
    "show",
    "--id",
    identifier,
    "--exact",
    "--disable-interactivity",
    "--source",
    "winget"
  ],
  searchArgs: (query) => [
    "search",
    query,
    "--source",
    "winget",
    "--disable-interactivity",
    "--accept-source-agreements"
  ],
  installCommand: (identifier) =>
    `winget install --id ${identifier} --exact --source winget --disable-interactivity`
};

export const chocoProfile: ManagerProfile = {
  key: "choco",
  aliases: ["chocolatey"],
  cli: "choco",
  label: "Chocolatey",
  verbs: ["install", "upgrade", "info", "search", "uninstall"],
  notFoundMarkers: ["0 packages found", "no packages found", "not installed. cannot find"],
  requireMatchingLine: false,
  successMessage: "Chocolatey info located the package.",
  parser: createPipeParser({ manager: "choco", emptyMarkers: ["no packages found"] }),
  checkArgs: (identifier) => ["search", identifier, "--exact", "--limit-output", "--id-only"],
  searchArgs: (query) => [
    "search",
    query,
    "--page=0",
    "--page-size=30",
    "--order-by-popularity",
    "--no-color",
    "--limit-output"
  ],
  installCommand: (identifier) => `choco install ${identifier} -y`
};

export const scoopProfile: ManagerProfile = {
  key: "scoop",
  aliases: [],
  cli: "scoop",
  label: "Scoop",
  verbs: ["install", "update", "upgrade", "info", "search"],
  notFoundMarkers: ["couldn't find manifest", "could not find manifest", "no matches found"],
  requireMatchingLine: true,
  successMessage: "Scoop search located the package.",
  parser: createBucketParser({ manager: "scoop", emptyMarkers: ["no matches found"] }),
  checkArgs: (identifier) => ["search", identifier],
  searchArgs: (query) => ["search", query],
  installCommand: (identifier) => `scoop install ${identifier}`
};

export class ManagerRegistry {
  private readonly byName = new Map<string, ManagerProfile>();

  constructor(private readonly profiles: readonly ManagerProfile[]) {
    for (const profile of profiles) {
      this.byName.set(profile.key.toLowerCase(), profile);
      for (const alias of profile.aliases) {
        this.byName.set(alias.toLowerCase(), profile);
      }
    }
  }

  get(manager: string): ManagerProfile | undefined {
    return this.byName.get(manager.trim().toLowerCase());
  }

  keys(): string[] {
    return this.profiles.map((profile) => profile.key);
  }

  /** The profile key for a known manager, the lower-cased input otherwise. */
  canonical(manager: string): string {
    return this.get(manager)?.key ?? manager.trim().toLowerCase();
  }
}

export function createDefaultRegistry(): ManagerRegistry {
  return new ManagerRegistry([wingetProfile, chocoProfile, scoopProfile]);
}

export function buildInstallCommand(registry: ManagerRegistry, manager: string, identifier: string): string {
  const profile = registry.get(manager);
  return profile ? profile.installCommand(identifier) : `${manager} install ${identifier}`;
}
