import * as punycode from "punycode";
import * as psl from "psl";

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const BARE_HOST = /^([^/\s:]+)(?::\d+)?(?:\/.*)?$/;
const LABEL = /^(?!-)[a-z0-9_-]{1,63}(?<!-)$/;
const MAX_HOST_LENGTH = 253;

function toAsciiHost(host: string): string {
  return punycode.toASCII(host).toLowerCase().replace(/^\.+|\.+$/g, "");
}

/**
 * Host part of a URL, IDN or bare `host[:port][/path]`, as lower-case ASCII.
 * Throws when no host can be read from the input.
 */
export function normalizeDomain(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) throw new Error("Invalid input");

  try {
    const url = new URL(SCHEME.test(trimmed) ? trimmed : `http://${trimmed}`);
    return toAsciiHost(url.hostname);
  } catch {
    const m = BARE_HOST.exec(trimmed);
    if (!m) throw new Error("Unable to normalize domain");
    return toAsciiHost(m[1]);
  }
}

/**
 * A usable target: well-formed DNS labels, at most 253 characters, and a
 * registrable domain under a public suffix. Bare suffixes (`co.uk`) and
 * single-label names (`localhost`) have no registrable domain and fail.
 */
export function isValidHost(host: string): boolean {
  let ascii: string;
  try {
    ascii = punycode.toASCII(host.trim().toLowerCase());
  } catch {
    return false;
  }
  if (!ascii || ascii.length > MAX_HOST_LENGTH) return false;
  if (!ascii.split(".").every((label) => LABEL.test(label))) return false;
  return psl.get(ascii) !== null;
}

/** Lower-case, trim and drop trailing dots from a raw candidate. */
export function normalizeCandidate(raw: string): string {
  return raw.trim().toLowerCase().replace(/\.+$/, "");
}

/** `host` is the target domain itself or one of its sub-labels. Both must be normalized. */
export function inScope(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

/**
 * Split a raw secondary-source entry into hostnames: one per whitespace-separated
 * token, URLs reduced to their hostname, leading wildcard labels stripped.
 */
export function expandRawName(raw: string): string[] {
  const out: string[] = [];
  for (const token of raw.split(/\s+/)) {
    if (!token) continue;
    let name = token;
    if (name.includes("://")) {
      try {
        name = new URL(name).hostname;
      } catch {
        continue;
      }
    }
    name = name.replace(/^(\*\.)+/, "");
    if (name) out.push(name);
  }
  return out;
}
