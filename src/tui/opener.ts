/**
 * Opens a post in the system default browser. The 'open' package handles
 * platform differences.
 */

import open from "open";

export async function openInBrowser(url: string): Promise<void> {
  const parsed = new URL(url);
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`Refusing to open non-web URL: ${url}`);
  }
  try {
    await open(parsed.toString());
  } catch (error) {
    throw new Error(
      `Failed to open URL: ${error instanceof Error ? error.message : "Unknown error"}`
    );
  }
}
