import type { CareProvider } from "../types.js";

export const CARE_PROVIDERS = ["parent_a", "parent_b", "nanny"] as const satisfies readonly CareProvider[];

/** Only the two guardians' split counts as "balance"; other coverage is informational. */
export const PRIMARY_PROVIDERS = ["parent_a", "parent_b"] as const satisfies readonly CareProvider[];

export const PROVIDER_INFO: Record<CareProvider, { displayName: string; color: string }> = {
  parent_a: { displayName: "Caregiver 1", color: "#5957D6" },
  parent_b: { displayName: "Caregiver 2", color: "#E6943A" },
  nanny: { displayName: "Nanny", color: "#6BAD91" }
};

export type ProviderNames = Partial<Record<CareProvider, string>>;

export function displayName(provider: CareProvider, names: ProviderNames = {}): string {
  const custom = names[provider]?.trim();
  return custom ? custom : PROVIDER_INFO[provider].displayName;
}
