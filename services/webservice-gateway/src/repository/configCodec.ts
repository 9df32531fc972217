import crypto from 'crypto';
import YAML from 'yaml';
import { WebserviceError, errorMessage } from '../errors';
import { WebserviceConfigData } from '../types';
import { parseConfig } from '../validation';

export const encodeConfig = (config: WebserviceConfigData): string => YAML.stringify(config);

export const decodeConfig = (text: string): WebserviceConfigData => {
    if (text.trim() === '') {
        return {};
    }

    let decoded: unknown;
    try {
        decoded = YAML.parse(text);
    } catch (err) {
        throw new WebserviceError({
            code: 'CONFIG_INVALID',
            message: `failed to parse webservice configuration: ${errorMessage(err)}`,
            cause: err,
        });
    }
    return parseConfig(decoded);
};

export const configMD5 = (text: string): string => crypto.createHash('md5').update(text, 'utf8').digest('hex');
