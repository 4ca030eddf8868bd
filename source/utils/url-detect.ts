import { MetadataError } from "../core/errors.js";

export function parseHttpUrl(input: string): URL {
	let parsed: URL;
	try {
		parsed = new URL(input.trim());
	} catch {
		throw new MetadataError(`Invalid URL: ${input}`);
	}

	if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
		throw new MetadataError(
			`Unsupported URL scheme: ${parsed.protocol}. Use http/https.`,
		);
	}

	return parsed;
}
