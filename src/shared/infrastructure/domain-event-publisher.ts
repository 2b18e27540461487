import { Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DomainEvent } from '../domain/base/domain-event.base';
import { AggregateRoot } from '../domain/base/aggregate-root.base';

/**
 * Domain Event Publisher
 * Hands pending aggregate events to the in-process event bus once the
 * aggregate has been persisted.
 */
@Injectable()
export class DomainEventPublisher {
    constructor(private readonly eventEmitter: EventEmitter2) { }

    /**
     * Publish all pending domain events from an aggregate.
     */
    publishEventsFromAggregate<T extends object>(aggregate: AggregateRoot<T>): void {
        const events = aggregate.domainEvents;
        aggregate.clearDomainEvents();
        this.publishAll(events);
    }

    /**
     * Publish a single domain event.
     */
    publish(event: DomainEvent): void {
        this.eventEmitter.emit(event.eventName, event.toPayload());
    }

    publishAll(events: readonly DomainEvent[]): void {
        for (const event of events) {
            this.publish(event);
        }
    }
}
