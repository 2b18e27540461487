import { ValueObject } from '../../../../shared/domain/base/value-object.base';

interface FacilitySetProps {
    readonly values: readonly string[];
}

export class FacilitySet extends ValueObject<FacilitySetProps> {
    private constructor(props: FacilitySetProps) {
        super(props);
    }

    get values(): string[] {
        return [...this.props.values];
    }

    get isEmpty(): boolean {
        return this.props.values.length === 0;
    }

    get size(): number {
        return this.props.values.length;
    }

    static create(values: Iterable<string>): FacilitySet {
        const unique = new Set<string>();
        for (const value of values) {
            const trimmed = value.trim();
            if (trimmed) unique.add(trimmed);
        }
        return new FacilitySet({ values: [...unique].sort() });
    }

    static empty(): FacilitySet {
        return new FacilitySet({ values: [] });
    }

    has(facility: string): boolean {
        return this.props.values.includes(facility);
    }

    intersects(other: FacilitySet): boolean {
        return this.props.values.some(value => other.has(value));
    }

    union(other: FacilitySet): FacilitySet {
        return FacilitySet.create([...this.props.values, ...other.props.values]);
    }

    toString(): string {
        return this.props.values.join(', ');
    }

    protected equalsCore(other: FacilitySet): boolean {
        return this.props.values.length === other.props.values.length &&
            this.props.values.every((value, index) => other.props.values[index] === value);
    }
}
