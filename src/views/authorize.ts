/**
 * OAuth consent page view
 */

import { escapeHtml } from "../lib/transforms.js";
import { pageShell } from "./styles.js";

const SCOPE_DESCRIPTIONS: Record<string, string[]> = {
	mcp: ["List and read posts", "Create and update posts", "Move posts to the trash or delete them"],
};

export interface ConsentPageParams {
	clientName: string;
	userId: string;
	// OAuth params carried through as hidden fields
	clientId: string;
	redirectUri: string;
	responseType: string;
	state: string;
	codeChallenge: string;
	codeChallengeMethod: string;
	scope: string;
}

function permissionItems(scope: string): string {
	const lines = scope
		.split(/\s+/)
		.filter(Boolean)
		.flatMap((name) => SCOPE_DESCRIPTIONS[name] ?? [`Scope: ${name}`]);
	return lines.map((line) => `<li>${escapeHtml(line)}</li>`).join("\n\t\t\t");
}

/** Render the consent page HTML */
export function renderConsentPage(params: ConsentPageParams): string {
	const hiddenFields = [
		["client_id", params.clientId],
		["redirect_uri", params.redirectUri],
		["response_type", params.responseType],
		["state", params.state],
		["code_challenge", params.codeChallenge],
		["code_challenge_method", params.codeChallengeMethod],
		["scope", params.scope],
	]
		.map(([name, value]) => `<input type="hidden" name="${name}" value="${escapeHtml(value)}">`)
		.join("\n\t\t");

	return pageShell(
		"Authorize access",
		`<div class="card">
	<h1>Authorize access</h1>
	<p class="subtitle"><strong>${escapeHtml(params.clientName)}</strong> wants to access your content.</p>
	<div class="permissions">
		<strong>This will allow it to:</strong>
		<ul>
			${permissionItems(params.scope)}
		</ul>
	</div>
	<div class="identity">Signed in as <code>${escapeHtml(params.userId)}</code></div>
	<form method="POST" action="/oauth/authorize">
		${hiddenFields}
		<div class="btn-group">
			<button type="submit" name="action" value="approve" class="btn btn-approve">Approve</button>
			<button type="submit" name="action" value="deny" class="btn btn-deny">Deny</button>
		</div>
	</form>
</div>`,
	);
}
