import { componentLogger } from '@generic-interface/service-template';
import { isPlainObject } from '../payload';
import { MappingConfig, Payload } from '../types';

const log = componentLogger('mapping');

const SIMPLE_MAPPING = 'Simple';

/**
 * Key based mapping:
 *   KeyMapDefault: { MapTo: '1' }       copy every source key unchanged
 *   KeyMap:        { source: 'target' } copy a present source key under a new name
 * Falls back to the input when the configuration produces nothing.
 */
export const applySimpleMapping = (config: Record<string, unknown> | undefined, data: Payload): Payload => {
    if (!config || Object.keys(config).length === 0) {
        return data;
    }

    const result: Payload = {};

    const keyMapDefault = config.KeyMapDefault;
    if (isPlainObject(keyMapDefault) && keyMapDefault.MapTo === '1') {
        Object.assign(result, data);
    }

    const keyMap = config.KeyMap;
    if (isPlainObject(keyMap)) {
        for (const [source, target] of Object.entries(keyMap)) {
            if (typeof target !== 'string') continue;
            if (Object.prototype.hasOwnProperty.call(data, source)) {
                result[target] = data[source];
            }
        }
    }

    return Object.keys(result).length === 0 ? data : result;
};

export const applyMapping = (mapping: MappingConfig | undefined, data: Payload): Payload => {
    const type = mapping?.Type ?? '';
    switch (type) {
        case '':
            return data;
        case SIMPLE_MAPPING:
            return applySimpleMapping(mapping?.Config, data);
        default:
            log.warn('Unsupported mapping type, passing data through', { mapping_type: type });
            return data;
    }
};
