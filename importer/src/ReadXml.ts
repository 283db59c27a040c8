import { XMLParser } from "fast-xml-parser";
import type { IuploadfileList } from "./ICommon.js";

// XML Parser configuration
const parserOptions = {
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    textNodeName: "#text",
    ignoreDeclaration: true,
    parseAttributeValue: false,
    parseTagValue: false,
    trimValues: false,
    isArray: (_name: string, _jpath: string, _isLeafNode: boolean, isAttribute: boolean) => {
        // Always treat elements as arrays for consistency
        return !isAttribute;
    }
};

const xmlParser = new XMLParser(parserOptions);

/**
 * A parsed element: attributes under "@_name", text under "#text" and
 * child elements as arrays keyed by tag
 */
export type XmlNode = { [key: string]: unknown };

function isXmlNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Child elements of a node by tag name
 */
export function children(node: unknown, tag: string): unknown[] {
    if (!isXmlNode(node)) {
        return [];
    }
    const data = node[tag];
    if (data === undefined) {
        return [];
    }
    return Array.isArray(data) ? data : [data];
}

/**
 * First child element by tag name
 */
export function firstChild(node: unknown, tag: string): unknown {
    return children(node, tag)[0];
}

/**
 * Walk a "/"-separated tag path, taking the first element at each step
 */
export function descend(node: unknown, path: string): unknown {
    let current = node;
    for (const tag of path.split("/")) {
        current = firstChild(current, tag);
        if (current === undefined) {
            return undefined;
        }
    }
    return current;
}

/**
 * Get attribute by name
 */
export function attribute(node: unknown, name: string): string | undefined {
    if (!isXmlNode(node)) {
        return undefined;
    }
    const value = node[`@_${name}`];
    return typeof value === 'string' ? value : undefined;
}

/**
 * Text content of a leaf element
 */
export function textOf(node: unknown): string {
    if (typeof node === 'string') {
        return node;
    }
    if (typeof node === 'number' || typeof node === 'boolean') {
        return String(node);
    }
    if (isXmlNode(node)) {
        return textOf(node["#text"]);
    }
    return "";
}

/**
 * ReadXml class for parsing XLSX XML parts
 */
export class ReadXml {
    originFile: IuploadfileList;
    private parsedXmlCache = new Map<string, unknown>();

    constructor(files: IuploadfileList) {
        this.originFile = files;
    }

    /**
     * Parse an archive member and cache the result
     * @returns The document root, or undefined when the member is missing
     */
    parseXmlFile(fileName: string): unknown {
        if (this.parsedXmlCache.has(fileName)) {
            return this.parsedXmlCache.get(fileName);
        }

        const file = this.getFileByName(fileName);
        if (file === undefined) {
            return undefined;
        }

        try {
            const parsed: unknown = xmlParser.parse(file);
            this.parsedXmlCache.set(fileName, parsed);
            return parsed;
        } catch (error) {
            const errorMessage = error instanceof Error ? error.message : String(error);
            throw new Error(`Failed to parse XML file "${fileName}": ${errorMessage}`);
        }
    }

    /**
     * Get file content by name, matching paths case-insensitively
     */
    private getFileByName(name: string): string | undefined {
        const wanted = name.toLowerCase();
        for (const fileKey of Object.keys(this.originFile)) {
            if (fileKey.toLowerCase() === wanted) {
                return this.originFile[fileKey];
            }
        }
        return undefined;
    }
}
