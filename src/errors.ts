/**
 * Shared Error Factory for boxpack domain errors.
 *
 * All functions are pure and return the structured MCP error response shape directly,
 * allowing tool handlers to do:
 *   return errors.imageFileNotFound(path);
 *
 * Library code that has to throw uses the same catalog: `new Error(errors.messageOf(errors.x()))`.
 */

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The LLM reads the text and can self-correct.
 */
export type DomainErrorResponse = {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
};

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

/**
 * Extracts the message text of a domain error, for throwing from library code.
 */
export function messageOf(response: DomainErrorResponse): string {
    return response.content.map((part) => part.text).join('\n');
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

// ----------------------------------------------------------------------------
// pack
// ----------------------------------------------------------------------------

export function unplaceableBox(label: string, width: number, height: number): DomainErrorResponse {
    return domainError(
        `Box '${label}' (${String(width)}×${String(height)}) does not fit in any free region. Raise maximum_width/maximum_height or reduce spacing.`,
    );
}

// ----------------------------------------------------------------------------
// atlas
// ----------------------------------------------------------------------------

export function imageFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Image file not found: ${path}`);
}

export function invalidImageFile(path: string): DomainErrorResponse {
    return domainError(`Invalid image file: ${path}. Expected a PNG.`);
}

export function duplicateSpriteName(name: string): DomainErrorResponse {
    return domainError(`Sprite name '${name}' is used by more than one image. Rename one of the files.`);
}

export function layoutFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Layout file not found: ${path}`);
}

export function invalidLayoutFile(path: string, detail: string): DomainErrorResponse {
    return domainError(`Invalid layout file: ${path}. ${detail}`);
}

export function cannotWritePath(path: string): DomainErrorResponse {
    return domainError(`Cannot write to path: ${path}`);
}
