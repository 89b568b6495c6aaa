import { ValidationError } from "../errors";
import type { ExtraLocation, SiteConfig } from "../types";

const DOMAIN_PATTERN =
  /^(\*\.)?([a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/;
const UPSTREAM_PATTERN = /^https?:\/\/[^\s;{}]+$/;
const DIRECTIVE_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
const UNSAFE_VALUE_PATTERN = /[\r\n{}#]/;

// Prompt-style validators: `true` when valid, otherwise the message to show.

export function validateDomain(input: string): true | string {
  const domain = input.trim();
  if (domain === "") {
    return "Domain is required";
  }
  if (domain === "localhost" || DOMAIN_PATTERN.test(domain)) {
    return true;
  }
  return "Please enter a valid domain name (e.g., example.com)";
}

export function validatePort(input: string | number): true | string {
  const text = String(input).trim();
  if (!/^\d+$/.test(text)) {
    return "Please enter a valid number";
  }
  const port = parseInt(text, 10);
  if (port < 1 || port > 65535) {
    return "Port must be between 1 and 65535";
  }
  return true;
}

export function validateLocationPath(input: string): true | string {
  const path = input.trim();
  if (!path.startsWith("/")) {
    return "Path must start with /";
  }
  if (/[\s;{}]/.test(path)) {
    return "Path cannot contain spaces, ';' or braces";
  }
  return true;
}

/**
 * Like validateLocationPath, but also refuses a path that already has a
 * location block in the same server.
 */
export function validateNewLocationPath(input: string, taken: string[]): true | string {
  const result = validateLocationPath(input);
  if (result !== true) {
    return result;
  }
  return taken.includes(input.trim())
    ? `A location for ${input.trim()} already exists`
    : true;
}

export function validateUpstream(input: string): true | string {
  const target = input.trim();
  if (target === "") {
    return "Upstream is required";
  }
  if (!UPSTREAM_PATTERN.test(target)) {
    return "Upstream must be an http:// or https:// URL (e.g., http://localhost:3000)";
  }
  return true;
}

export function validateRootDir(input: string): true | string {
  const dir = input.trim();
  if (!dir.startsWith("/")) {
    return "Root directory must be an absolute path";
  }
  if (/[\s;{}]/.test(dir)) {
    return "Root directory cannot contain spaces, ';' or braces";
  }
  return true;
}

/**
 * Space-separated list of index file names, as typed at the prompt.
 */
export function validateIndexFiles(input: string): true | string {
  const files = input.trim().split(/\s+/).filter((file) => file !== "");
  if (files.length === 0) {
    return "At least one index file is required";
  }
  if (files.some((file) => /[;{}#]/.test(file))) {
    return "Index file names cannot contain ';', '#' or braces";
  }
  return true;
}

export function validateDirectiveName(input: string): true | string {
  return DIRECTIVE_NAME_PATTERN.test(input.trim())
    ? true
    : "Directive names are letters, digits and underscores";
}

export function validateDirectiveValue(input: string): true | string {
  if (input.trim() === "") {
    return "Directive value is required";
  }
  return UNSAFE_VALUE_PATTERN.test(input)
    ? "Directive values cannot contain braces, '#' or line breaks"
    : true;
}

/**
 * Parse and validate port number
 */
export function parsePort(input: string | number): number {
  const result = validatePort(input);
  if (result !== true) {
    throw new ValidationError(`Invalid port: ${input}. ${result}`, "port");
  }
  return parseInt(String(input).trim(), 10);
}

/**
 * Map a domain onto a safe file name (wildcards and other symbols become "_").
 */
export function sanitizeDomain(domain: string): string {
  return domain.trim().replace(/[^\w.-]/g, "_");
}

function check(result: true | string, field: string): void {
  if (result !== true) {
    throw new ValidationError(result, field);
  }
}

function checkLocation(location: ExtraLocation, index: number): void {
  const field = `extraLocations[${index}]`;
  check(validateLocationPath(location.path), `${field}.path`);
  location.directives.forEach(([name, value], i) => {
    check(validateDirectiveName(name), `${field}.directives[${i}]`);
    check(validateDirectiveValue(value), `${field}.directives[${i}]`);
  });
}

/**
 * Throws a ValidationError naming the first field that is unusable.
 */
export function assertValidSiteConfig(config: SiteConfig): void {
  check(validateDomain(config.domain), "domain");
  if (!Number.isInteger(config.port)) {
    throw new ValidationError(
      `Invalid port: ${config.port}. Port must be an integer`,
      "port"
    );
  }
  check(validatePort(config.port), "port");

  if (config.mode === "proxy") {
    check(validateUpstream(config.proxyTarget), "proxyTarget");
    check(validateLocationPath(config.proxyPath), "proxyPath");
  } else {
    check(validateRootDir(config.rootDir), "rootDir");
    check(validateIndexFiles(config.indexFiles.join(" ")), "indexFiles");
  }

  const taken = config.mode === "proxy" ? [config.proxyPath.trim()] : [];
  config.extraLocations.forEach((location, index) => {
    checkLocation(location, index);
    check(validateNewLocationPath(location.path, taken), `extraLocations[${index}].path`);
    taken.push(location.path.trim());
  });
}
