import { applyMapping, applySimpleMapping } from './index';

describe('applyMapping', () => {
    const data = { name: 'Ada', city: 'Paris', id: 7 };

    it('should pass data through without a mapping type', () => {
        expect(applyMapping(undefined, data)).toBe(data);
        expect(applyMapping({ Type: '' }, data)).toBe(data);
    });

    it('should pass data through for unsupported types', () => {
        expect(applyMapping({ Type: 'XSLT', Config: { Template: '<xsl/>' } }, data)).toBe(data);
    });

    it('should rename mapped keys and drop the rest', () => {
        expect(applyMapping({ Type: 'Simple', Config: { KeyMap: { name: 'FullName', missing: 'Nope' } } }, data)).toEqual({
            FullName: 'Ada',
        });
    });

    it('should copy all keys when KeyMapDefault maps to 1', () => {
        const mapped = applySimpleMapping({ KeyMapDefault: { MapTo: '1' }, KeyMap: { id: 'ID' } }, data);
        expect(mapped).toEqual({ name: 'Ada', city: 'Paris', id: 7, ID: 7 });
    });

    it('should return the original data when the mapping produces nothing', () => {
        expect(applySimpleMapping({ KeyMap: { unknown: 'X' } }, data)).toBe(data);
        expect(applySimpleMapping({}, data)).toBe(data);
        expect(applySimpleMapping(undefined, data)).toBe(data);
    });

    it('should ignore non-string targets', () => {
        expect(applySimpleMapping({ KeyMap: { name: 5, city: 'Town' } }, data)).toEqual({ Town: 'Paris' });
    });
});
