import {
    ArrayNotEmpty,
    IsArray,
    IsDate,
    IsEmail,
    IsInt,
    IsNotEmpty,
    IsOptional,
    IsString,
    MaxLength,
    Min,
} from 'class-validator';
import { Type } from 'class-transformer';
import { BOOKING_FIELDS } from '../../domain/index';
import type { BookingField, BookingFieldValues } from '../../domain/index';

export class UpdateBookingFieldsDto {
    @IsOptional()
    @IsString()
    @IsNotEmpty()
    @MaxLength(200)
    groupName?: string;

    @IsOptional()
    @IsString()
    @IsNotEmpty()
    @MaxLength(200)
    leaderName?: string;

    @IsOptional()
    @IsString()
    @IsNotEmpty()
    @MaxLength(40)
    leaderPhone?: string;

    @IsOptional()
    @IsEmail()
    leaderEmail?: string;

    @IsOptional()
    @IsString()
    @IsNotEmpty()
    groupType?: string;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    groupSize?: number;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(0)
    costEstimate?: number;

    @IsOptional()
    @Type(() => Date)
    @IsDate()
    arriving?: Date;

    @IsOptional()
    @Type(() => Date)
    @IsDate()
    departing?: Date;

    @IsOptional()
    @IsArray()
    @ArrayNotEmpty()
    @IsString({ each: true })
    @IsNotEmpty({ each: true })
    facilities?: string[];

    @IsOptional()
    @IsString()
    @MaxLength(2000)
    bookersComment?: string;

    toFieldValues(): BookingFieldValues {
        return {
            groupName: this.groupName,
            leaderName: this.leaderName,
            leaderPhone: this.leaderPhone,
            leaderEmail: this.leaderEmail,
            groupType: this.groupType,
            groupSize: this.groupSize,
            costEstimate: this.costEstimate,
            arriving: this.arriving,
            departing: this.departing,
            facilities: this.facilities,
            bookersComment: this.bookersComment,
        };
    }

    providedFields(): BookingField[] {
        const values = this.toFieldValues();
        return BOOKING_FIELDS.filter(field => values[field] !== undefined);
    }
}
