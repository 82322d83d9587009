import type { HostingConfig } from "../../core/config.js";

// =============================================================================
// NAMING
// =============================================================================

export function buildPagesRepoName(login: string, pagesDomain: string): string {
  return `${login}.${pagesDomain}`;
}

export function buildRemoteUrl(gitBaseUrl: string, owner: string, repo: string): string {
  return `${trimTrailingSlash(gitBaseUrl)}/${owner}/${repo}.git`;
}

export function buildDeployCommitMessage(name: string, repoName: string): string {
  return [
    `Deploy portfolio for ${name}`,
    "",
    "Portfolio website deployed via folio.",
    `Site: https://${repoName}/`,
  ].join("\n");
}

// =============================================================================
// SITE LINKS
// =============================================================================

export type SiteLinks = {
  repository: string;
  actions: string;
  pagesSettings: string;
  liveSite: string;
};

export function buildSiteLinks(
  hosting: Pick<HostingConfig, "web_base_url">,
  owner: string,
  repoName: string,
  domain: string | undefined,
): SiteLinks {
  const repository = `${trimTrailingSlash(hosting.web_base_url)}/${owner}/${repoName}`;
  return {
    repository,
    actions: `${repository}/actions`,
    pagesSettings: `${repository}/settings/pages`,
    liveSite: domain ? `https://${domain}` : `https://${repoName}`,
  };
}

// =============================================================================
// DNS
// =============================================================================

export type DnsRecord = {
  type: "A" | "CNAME";
  host: string;
  value: string;
};

export function buildDnsRecords(
  pagesIps: string[],
  owner: string,
  pagesDomain: string,
): DnsRecord[] {
  return [
    ...pagesIps.map((ip): DnsRecord => ({ type: "A", host: "@", value: ip })),
    { type: "CNAME", host: "www", value: `${owner}.${pagesDomain}` },
  ];
}

export function formatDnsRecord(record: DnsRecord): string {
  const type = `${record.type},`.padEnd(6);
  const host = `${record.host},`.padEnd(4);
  return `Type: ${type} Host: ${host} Value: ${record.value}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}
