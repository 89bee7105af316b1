/**
 * Resource Registry
 *
 * Static resources addressed by URI, read on demand.
 */

import { JsonRpcError } from "./errors.js";

export interface ResourceContents {
	uri: string;
	mimeType: string;
	text: string;
}

export interface ResourceDefinition {
	uri: string;
	name: string;
	description?: string;
	mimeType: string;
	read: () => string | Promise<string>;
}

export interface ResourceTemplate {
	uriTemplate: string;
	name: string;
	description?: string;
	mimeType?: string;
}

export class ResourceRegistry {
	private readonly resources = new Map<string, ResourceDefinition>();
	private readonly templates: ResourceTemplate[] = [];

	register(resource: ResourceDefinition): this {
		if (this.resources.has(resource.uri)) {
			throw new Error(`Resource already registered: ${resource.uri}`);
		}
		this.resources.set(resource.uri, resource);
		return this;
	}

	registerTemplate(template: ResourceTemplate): this {
		this.templates.push(template);
		return this;
	}

	list(): Array<Omit<ResourceDefinition, "read">> {
		return [...this.resources.values()].map(({ read: _read, ...descriptor }) => descriptor);
	}

	listTemplates(): ResourceTemplate[] {
		return [...this.templates];
	}

	async read(uri: string): Promise<ResourceContents[]> {
		const resource = this.resources.get(uri);
		if (!resource) {
			throw JsonRpcError.invalidParams(`Resource not found: ${uri}`);
		}
		return [{ uri, mimeType: resource.mimeType, text: await resource.read() }];
	}
}
