import { capitalize } from "./normalize";

const WEB_PROTOCOLS = new Set(["http:", "https:"]);

const normalizeHostname = (hostname: string) =>
  hostname.toLowerCase().replace(/^www\./, "");

export const getHostname = (input: string): string | null => {
  try {
    const url = new URL(input);
    if (!WEB_PROTOCOLS.has(url.protocol) || !url.hostname) {
      return null;
    }
    return normalizeHostname(url.hostname);
  } catch {
    return null;
  }
};

/** Accepts full URLs as well as bare domains such as `acme.com`. */
export const isUsableCompanyUrl = (input: string): boolean => {
  const trimmed = input.trim();
  if (!trimmed) {
    return false;
  }
  return getHostname(trimmed) !== null || getHostname(`https://${trimmed}`) !== null;
};

/**
 * Display name for a company known only by its URL: first host label, capitalized.
 * Inputs without a scheme have no host and keep the raw value.
 */
export const deriveCompanyName = (companyUrl: string): string => {
  const hostname = getHostname(companyUrl);
  if (!hostname) {
    return companyUrl;
  }
  const [label] = hostname.split(".");
  return label ? capitalize(label) : companyUrl;
};
