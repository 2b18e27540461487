import { DomainEvent } from './domain-event.base';

export abstract class AggregateRoot<T extends object> {
    private readonly _domainEvents: DomainEvent[] = [];

    protected constructor(
        public readonly id: string,
        protected props: T,
    ) { }

    get domainEvents(): readonly DomainEvent[] {
        return [...this._domainEvents];
    }

    protected addDomainEvent(event: DomainEvent): void {
        this._domainEvents.push(event);
    }

    clearDomainEvents(): void {
        this._domainEvents.length = 0;
    }
}
