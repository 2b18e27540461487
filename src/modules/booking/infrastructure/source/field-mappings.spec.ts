import { join } from 'path';
import { TEST_FIELD_MAPPINGS } from '../../testing/booking.fixtures';
import { loadFieldMappings, parseFieldMappings } from './field-mappings';

describe('field mappings', () => {
    it('loads the shipped configuration', async () => {
        const mappings = await loadFieldMappings(join(__dirname, '../../../../../config/field-mappings.json'));

        expect(mappings.defaultGroupType).toBe('district');
        expect(mappings.groupTypes.district).toEqual({ description: 'District', prefix: 'DIS' });
        expect(mappings.keyMapping.leader.email).toBe('email_address');
    });

    it('accepts the test mappings', async () => {
        await expect(parseFieldMappings(TEST_FIELD_MAPPINGS)).resolves.toMatchObject({ dateFormat: 'dd/MM/yyyy HH:mm:ss' });
    });

    it('requires the default group type to be declared', async () => {
        await expect(parseFieldMappings({ ...TEST_FIELD_MAPPINGS, defaultGroupType: 'county' }))
            .rejects.toThrow('Invalid field mappings: defaultGroupType county is not declared in groupTypes');
    });

    it('checks every group type prefix', async () => {
        await expect(parseFieldMappings({
            ...TEST_FIELD_MAPPINGS,
            groupTypes: { ...TEST_FIELD_MAPPINGS.groupTypes, county: { description: 'County', prefix: 'c' } },
        })).rejects.toThrow('groupTypes.county.prefix: prefix must be 2-6 upper case letters or digits');
    });

    it('requires some way to find the departure', async () => {
        const { departing: _departing, departureTime: _time, ...booking } = TEST_FIELD_MAPPINGS.keyMapping.booking;
        await expect(parseFieldMappings({
            ...TEST_FIELD_MAPPINGS,
            keyMapping: { ...TEST_FIELD_MAPPINGS.keyMapping, booking },
        })).rejects.toThrow('keyMapping.booking needs a departing or departureTime column');
    });

    it('reports a missing file', async () => {
        await expect(loadFieldMappings(join(__dirname, 'no-such-file.json')))
            .rejects.toThrow(/^Unable to read field mappings from .*no-such-file\.json/);
    });
});
