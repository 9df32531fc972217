import { parseConfig } from './index';

describe('parseConfig', () => {
    it('should treat a missing block as an empty config', () => {
        expect(parseConfig(null)).toEqual({});
        expect(parseConfig(undefined)).toEqual({});
    });

    it('should coerce scalar settings to strings', () => {
        const config = parseConfig({
            Debugger: { TestMode: 0 },
            Requester: { Transport: { Type: 'HTTP::SOAP', Config: { Timeout: 15, Authentication: { APIKey: 12345 } } } },
        });

        expect(config.Debugger?.TestMode).toBe('0');
        expect(config.Requester?.Transport?.Config).toEqual({ Timeout: '15', Authentication: { APIKey: '12345' } });
    });

    it('should reject blocks of the wrong shape', () => {
        expect(() => parseConfig({ Requester: { Invoker: ['Search'] } })).toThrow(/^invalid webservice configuration: /);
        expect(() => parseConfig('Requester')).toThrow(/^invalid webservice configuration: /);
    });
});
