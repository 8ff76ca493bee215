import open, { apps } from "open";

export type BrowserChoice = "default" | "firefox" | "chromium";

export const BROWSER_CHOICES: readonly BrowserChoice[] = ["default", "firefox", "chromium"];

export function isBrowserChoice(value: string): value is BrowserChoice {
	return BROWSER_CHOICES.some((choice) => choice === value);
}

/** Launches a browser without waiting for it to exit */
export async function openInBrowser(
	url: string,
	browser: BrowserChoice = "default",
): Promise<void> {
	switch (browser) {
		case "default":
			await open(url);
			return;
		case "firefox":
			await open(url, { app: { name: apps.firefox } });
			return;
		case "chromium":
			await open(url, { app: { name: apps.chrome } });
			return;
	}
}
