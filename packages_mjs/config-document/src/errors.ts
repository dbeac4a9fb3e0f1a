export class DocumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DocumentError';
    }
}

export class DocumentParseError extends DocumentError {
    constructor(
        public filePath: string,
        public reason: string
    ) {
        super(`Failed to parse document '${filePath}': ${reason}`);
        this.name = 'DocumentParseError';
    }
}

export class DocumentConversionError extends DocumentError {
    constructor(
        public keyPath: string[],
        public valueType: string
    ) {
        const at = keyPath.length > 0 ? keyPath.join('.') : '<root>';
        super(`Unsupported value of type ${valueType} at ${at}`);
        this.name = 'DocumentConversionError';
    }
}
