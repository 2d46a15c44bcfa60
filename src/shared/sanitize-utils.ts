/**
 * Replaces GitHub credentials in error messages and log lines with '***'.
 * Covers the GH_TOKEN prefix put in front of `gh api` commands, HTTP
 * Authorization headers and bare GitHub token strings.
 */
export function sanitizeCredentials(
  message: string | undefined | null
): string {
  if (!message) {
    return "";
  }

  let result = message;

  // GH_TOKEN='...' prefix of a failed gh command line
  result = result.replace(/(GH_TOKEN=)('[^']*'|\S+)/g, "$1***");

  result = result.replace(
    /(Authorization:\s*(?:Bearer|token)\s+)(\S+)/gi,
    "$1***"
  );

  // ghp_ (PAT), ghs_ (installation), gho_/ghu_/ghr_ (OAuth, user, refresh)
  result = result.replace(/\bgh[psour]_[A-Za-z0-9]{8,}\b/g, "***");
  result = result.replace(/\bgithub_pat_[A-Za-z0-9_]{8,}\b/g, "***");

  return result;
}
