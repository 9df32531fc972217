import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import webserviceConfigSchema from '../../../../shared/schemas/WebserviceConfig.json';
import { WebserviceError } from '../errors';
import { WebserviceConfigData } from '../types';

// Scalars written by hand in YAML (Timeout: 30) are coerced to the string form the config uses.
const ajv = new Ajv({ strict: false, coerceTypes: true, allErrors: true });
addFormats(ajv);

const validateWebserviceConfig = ajv.compile<WebserviceConfigData>(webserviceConfigSchema);

/** Validates (and coerces in place) a decoded configuration block. */
export const parseConfig = (value: unknown): WebserviceConfigData => {
    if (value === null || value === undefined) {
        return {};
    }
    if (validateWebserviceConfig(value)) {
        return value;
    }
    throw new WebserviceError({
        code: 'CONFIG_INVALID',
        message: `invalid webservice configuration: ${ajv.errorsText(validateWebserviceConfig.errors)}`,
        details: validateWebserviceConfig.errors,
    });
};
