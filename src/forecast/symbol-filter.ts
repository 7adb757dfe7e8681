import { z } from "zod";
import { readJsonDataFile } from "../data-files.js";

const SymbolAliasesSchema = z.object({
  crypto: z.record(z.string(), z.array(z.string())),
  cryptoBareTickers: z.array(z.string()),
  teams: z.record(z.string(), z.array(z.string())),
});

export type SymbolAliases = z.infer<typeof SymbolAliasesSchema>;

let cachedAliases: SymbolAliases | null = null;

export function loadSymbolAliases(): SymbolAliases {
  cachedAliases ??= SymbolAliasesSchema.parse(readJsonDataFile("symbol-aliases.json"));
  return cachedAliases;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function aliasPattern(alias: string): RegExp {
  const body = alias.trim().split(/\s+/).map(escapeRegExp).join("\\s+");
  return new RegExp(`\\b${body}\\b`, "i");
}

function mentionsAny(text: string, aliases: string[]): boolean {
  return aliases.some((alias) => aliasPattern(alias).test(text));
}

export type SymbolDomain = "sports" | "crypto" | "generic";

export function symbolDomain(symbol: string, aliases: SymbolAliases = loadSymbolAliases()): SymbolDomain {
  if (symbol.startsWith("NFL:")) {
    return "sports";
  }
  if (symbol.endsWith("-USD") || aliases.cryptoBareTickers.includes(symbol)) {
    return "crypto";
  }
  return "generic";
}

/**
 * Whether `text` names `symbol`. Team symbols need a configured alias; crypto
 * pairs without configured aliases pass through; anything else is matched as
 * a whole word.
 */
export function isSymbolMentioned(
  text: string,
  symbol: string,
  aliases: SymbolAliases = loadSymbolAliases(),
): boolean {
  if (!text || !symbol) {
    return false;
  }
  switch (symbolDomain(symbol, aliases)) {
    case "sports":
      return mentionsAny(text, aliases.teams[symbol] ?? []);
    case "crypto": {
      const pair = symbol.endsWith("-USD") ? symbol : `${symbol}-USD`;
      const configured = aliases.crypto[pair];
      return configured ? mentionsAny(text, configured) : true;
    }
    default:
      return aliasPattern(symbol).test(text);
  }
}
