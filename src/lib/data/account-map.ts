import { ACCOUNT_SECTIONS, type AccountMap, type AccountMapEntry, type AccountSection } from "../schemas";

export interface AccountMatch {
  section: AccountSection;
  category: string;
  entry: AccountMapEntry;
}

function normalize(code: string): string {
  return code.replace(/%/g, "").trim();
}

/**
 * Resolve a ledger account code to its mapped category. An exact code wins;
 * otherwise the longest mapped code that prefixes the account code is used.
 */
export function getCategoryForAccountCode(
  map: AccountMap,
  accountCode: string,
  section?: AccountSection,
): AccountMatch | null {
  const code = normalize(accountCode);
  if (!code) return null;

  const sections = section ? [section] : ACCOUNT_SECTIONS;
  let best: (AccountMatch & { length: number }) | null = null;

  for (const s of sections) {
    for (const [category, entry] of Object.entries(map[s] ?? {})) {
      for (const raw of entry.codes) {
        const mapped = normalize(raw);
        if (!mapped) continue;
        if (mapped === code) return { section: s, category, entry };
        if (code.startsWith(mapped) && (best === null || mapped.length > best.length)) {
          best = { section: s, category, entry, length: mapped.length };
        }
      }
    }
  }

  return best && { section: best.section, category: best.category, entry: best.entry };
}

export function getAllAccountCodes(map: AccountMap, section?: AccountSection): string[] {
  const sections = section ? [section] : ACCOUNT_SECTIONS;
  const codes = sections.flatMap((s) => Object.values(map[s] ?? {}).flatMap((entry) => entry.codes.map(normalize)));
  return [...new Set(codes)].filter(Boolean).sort();
}

/** Ledger balance (debit - credit) turned into a positive amount for the entry's side. */
export function signedAmount(entry: AccountMapEntry, balance: number): number {
  switch (entry.sign) {
    case "credit":
      return -balance;
    case "debit":
      return balance;
    default:
      return Math.abs(balance);
  }
}
