export class TopologyError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TopologyError';
    }
}
