import { ValueObject } from '../../../../shared/domain/base/value-object.base';

interface StayIntervalProps {
    readonly arriving: Date;
    readonly departing: Date;
}

/**
 * Half-open stay window `[arriving, departing)`.
 */
export class StayInterval extends ValueObject<StayIntervalProps> {
    private constructor(props: StayIntervalProps) {
        super(props);
    }

    get arriving(): Date { return new Date(this.props.arriving); }
    get departing(): Date { return new Date(this.props.departing); }

    get durationMs(): number {
        return this.props.departing.getTime() - this.props.arriving.getTime();
    }

    static create(arriving: Date | string, departing: Date | string): StayInterval {
        const start = new Date(arriving);
        const end = new Date(departing);

        if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
            throw new Error('Arrival and departure must be valid dates');
        }
        if (start.getTime() >= end.getTime()) {
            throw new Error('Arrival must be before departure');
        }

        return new StayInterval({ arriving: start, departing: end });
    }

    overlaps(other: StayInterval): boolean {
        return this.props.arriving.getTime() < other.props.departing.getTime() &&
            other.props.arriving.getTime() < this.props.departing.getTime();
    }

    startsAfter(instant: Date): boolean {
        return this.props.arriving.getTime() > instant.getTime();
    }

    endsBefore(instant: Date): boolean {
        return this.props.departing.getTime() < instant.getTime();
    }

    protected equalsCore(other: StayInterval): boolean {
        return this.props.arriving.getTime() === other.props.arriving.getTime() &&
            this.props.departing.getTime() === other.props.departing.getTime();
    }
}
