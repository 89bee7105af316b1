/**
 * Shared styles and HTML shell for view templates
 */

import { escapeHtml } from "../lib/transforms.js";

export function baseStyles(): string {
	return `
		* { margin: 0; padding: 0; box-sizing: border-box; }
		body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif;
			   line-height: 1.6; color: #1f2937; min-height: 100vh; padding: 20px;
			   background: #f3f4f6; display: flex; align-items: center; justify-content: center; }
		.card { background: white; border-radius: 12px; max-width: 480px; width: 100%;
				padding: 32px; box-shadow: 0 2px 8px rgba(0,0,0,0.1); }
		h1 { font-size: 20px; margin-bottom: 8px; }
		.subtitle { color: #4b5563; font-size: 14px; margin-bottom: 20px; }
		.permissions { background: #f9fafb; border-radius: 8px; padding: 16px; margin: 16px 0; }
		.permissions li { margin: 6px 0 6px 18px; font-size: 14px; }
		.identity { font-size: 13px; color: #6b7280; margin: 16px 0; }
		.btn-group { display: flex; gap: 10px; margin-top: 20px; }
		.btn { flex: 1; padding: 12px; border: none; border-radius: 8px;
			   font-size: 15px; font-weight: 600; cursor: pointer; }
		.btn-approve { background: #2563eb; color: white; }
		.btn-approve:hover { background: #1d4ed8; }
		.btn-deny { background: #e5e7eb; color: #374151; }
		.btn-deny:hover { background: #d1d5db; }
	`;
}

export function pageShell(title: string, bodyHtml: string): string {
	return `<!DOCTYPE html>
<html lang="en"><head>
	<meta charset="UTF-8">
	<meta name="viewport" content="width=device-width, initial-scale=1.0">
	<title>${escapeHtml(title)}</title>
	<style>${baseStyles()}</style>
</head><body>${bodyHtml}</body></html>`;
}
