// Invalid topology parameters, unknown consensus settings, missing horizon...
// Always raised before the first event is dispatched.
export class ConfigurationError extends Error {
    constructor(message: string, public readonly field?: string) {
        super(field ? `${field}: ${message}` : message);
        this.name = "ConfigurationError";
    }
}

export class DisconnectedTopologyError extends ConfigurationError {
    constructor(
        public readonly kind: string,
        public readonly reached: number,
        public readonly total: number,
    ) {
        super(
            `${kind} topology is not connected (${reached} of ${total} nodes reachable)`,
            "topology",
        );
        this.name = "DisconnectedTopologyError";
    }
}

// The driver must check `isEmpty()` before popping.
export class EmptyQueueError extends Error {
    constructor() {
        super("popNext() called on an empty event queue");
        this.name = "EmptyQueueError";
    }
}

export class MissingParentError extends Error {
    constructor(
        public readonly nodeId: string,
        public readonly blockId: string,
        public readonly parentId: string,
    ) {
        super(
            `Block ${blockId} inserted at ${nodeId} before its parent ${parentId}`,
        );
        this.name = "MissingParentError";
    }
}
