export abstract class DomainEvent {
    readonly occurredOn: Date;

    protected constructor(
        public readonly eventName: string,
        occurredOn: Date = new Date(),
    ) {
        this.occurredOn = occurredOn;
    }

    abstract toPayload(): Record<string, unknown>;
}
