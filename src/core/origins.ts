export interface OriginDefinition {
  key: string;
  displayName: string;
}

/**
 * Canonical origin buckets. Classification takes the first key that prefixes
 * the origin string, so the order here decides which bucket wins.
 */
export const ORIGIN_DEFINITIONS: readonly OriginDefinition[] = [
  { key: "ADO", displayName: "Azure DevOps" },
  { key: "Bamboo", displayName: "Bamboo" },
  { key: "CLI", displayName: "CLI" },
  { key: "cx-CLI", displayName: "CxCLI" },
  { key: "CxFlow", displayName: "CxFlow" },
  { key: "Eclipse", displayName: "Eclipse" },
  { key: "cx-intellij", displayName: "IntelliJ" },
  { key: "Jenkins", displayName: "Jenkins" },
  { key: "Manual", displayName: "Manual" },
  { key: "Maven", displayName: "Maven" },
  { key: "Other", displayName: "Other" },
  { key: "System", displayName: "System" },
  { key: "TeamCity", displayName: "TeamCity" },
  { key: "TFS", displayName: "TFS" },
  { key: "Visual Studio", displayName: "Visual Studio" },
  { key: "Visual-Studio-Code", displayName: "VS Code" },
  { key: "VSTS", displayName: "VSTS" },
  { key: "Web Portal", displayName: "Web Portal" },
];

export const FALLBACK_ORIGIN_KEY = "Other";

export const ORIGIN_KEYS: readonly string[] = ORIGIN_DEFINITIONS.map(
  (definition) => definition.key,
);

export function classifyOrigin(
  origin: string | null | undefined,
  keys: readonly string[] = ORIGIN_KEYS,
): string {
  if (origin === null || origin === undefined) {
    return FALLBACK_ORIGIN_KEY;
  }

  return keys.find((key) => origin.startsWith(key)) ?? FALLBACK_ORIGIN_KEY;
}

export function originDisplayName(key: string): string {
  return (
    ORIGIN_DEFINITIONS.find((definition) => definition.key === key)?.displayName ?? key
  );
}
