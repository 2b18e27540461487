import { readFile } from 'fs/promises';
import {
    ArrayNotEmpty,
    IsArray,
    IsNotEmpty,
    IsObject,
    IsOptional,
    IsString,
    Matches,
    ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { validateInput } from '../../../../common/validation/validate-input';

export const FIELD_MAPPINGS = Symbol('FIELD_MAPPINGS');

export class GroupTypeDefinition {
    @IsString()
    @IsNotEmpty()
    description!: string;

    @Matches(/^[A-Z0-9]{2,6}$/, { message: 'prefix must be 2-6 upper case letters or digits' })
    prefix!: string;
}

export class LeaderKeyMapping {
    @IsString() @IsNotEmpty() name!: string;
    @IsString() @IsNotEmpty() email!: string;
    @IsString() @IsNotEmpty() phone!: string;
}

export class BookingKeyMapping {
    @IsString() @IsNotEmpty() groupName!: string;
    @IsString() @IsNotEmpty() groupSize!: string;
    @IsString() @IsNotEmpty() facilities!: string;
    @IsString() @IsNotEmpty() arriving!: string;

    @IsOptional() @IsString() departing?: string;
    /** Time-of-day column; departure falls on the arrival day. */
    @IsOptional() @IsString() departureTime?: string;
    @IsOptional() @IsString() submitted?: string;
    @IsOptional() @IsString() groupType?: string;
    @IsOptional() @IsString() costEstimate?: string;
    @IsOptional() @IsString() bookersComment?: string;
    @IsOptional() @IsString() submissionReference?: string;
}

export class KeyMapping {
    @ValidateNested()
    @Type(() => LeaderKeyMapping)
    leader!: LeaderKeyMapping;

    @ValidateNested()
    @Type(() => BookingKeyMapping)
    booking!: BookingKeyMapping;
}

export class FieldMappings {
    @IsString()
    @IsNotEmpty()
    defaultGroupType!: string;

    @IsString()
    @IsNotEmpty()
    dateFormat!: string;

    @IsArray()
    @ArrayNotEmpty()
    @IsString({ each: true })
    externalKeyFields!: string[];

    @IsObject()
    groupTypes!: Record<string, GroupTypeDefinition>;

    @ValidateNested()
    @Type(() => KeyMapping)
    keyMapping!: KeyMapping;
}

/**
 * Reads and validates the sheet-to-booking field mappings.
 */
export async function loadFieldMappings(path: string): Promise<FieldMappings> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
        throw new Error(`Unable to read field mappings from ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return parseFieldMappings(parsed);
}

export async function parseFieldMappings(input: unknown): Promise<FieldMappings> {
    const outcome = await validateInput(FieldMappings, input);
    if (!outcome.valid) {
        throw new Error(`Invalid field mappings: ${outcome.problems.join('; ')}`);
    }

    const mappings = outcome.value;
    const problems: string[] = [];
    const groupTypes: Record<string, GroupTypeDefinition> = {};

    for (const [key, definition] of Object.entries(mappings.groupTypes)) {
        const checked = await validateInput(GroupTypeDefinition, definition);
        if (checked.valid) {
            groupTypes[key] = checked.value;
        } else {
            problems.push(...checked.problems.map(problem => `groupTypes.${key}.${problem}`));
        }
    }

    if (!(mappings.defaultGroupType in groupTypes)) {
        problems.push(`defaultGroupType ${mappings.defaultGroupType} is not declared in groupTypes`);
    }
    if (!mappings.keyMapping.booking.departing && !mappings.keyMapping.booking.departureTime) {
        problems.push('keyMapping.booking needs a departing or departureTime column');
    }
    if (problems.length > 0) {
        throw new Error(`Invalid field mappings: ${problems.join('; ')}`);
    }

    mappings.groupTypes = groupTypes;
    return mappings;
}
