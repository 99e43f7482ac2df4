import type { ArtifactRuleOptions, OptionsInput, ValidationResult } from './types';

const TAG_NAME = /^[a-z][a-z0-9-]*$/i;

function validateStringList(value: unknown, key: string, errors: string[]): string[] | undefined {
    if (value === undefined) return undefined;
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) return value;
    errors.push(`${key} must be an array of strings`);
    return undefined;
}

function validatePattern(value: unknown, key: string, errors: string[]): RegExp | string | undefined {
    if (value === undefined) return undefined;
    if (value instanceof RegExp) return value;
    if (typeof value === 'string') {
        try {
            new RegExp(value);
            return value;
        } catch {
            errors.push(`${key} is not a valid regular expression`);
            return undefined;
        }
    }
    errors.push(`${key} must be a RegExp or pattern string`);
    return undefined;
}

/**
 * Validate rule overrides coming from a host's settings store.
 * Invalid keys are reported and left out of `value`, so `value` can still be passed
 * to `buildArtifactRules` to fall back to the defaults for those keys.
 */
export function validateRuleOptions(options: unknown): ValidationResult<ArtifactRuleOptions> {
    if (options === null || typeof options !== 'object' || Array.isArray(options)) {
        return { isValid: false, error: 'Options must be an object' };
    }
    const o = options as OptionsInput;
    const invalid: string[] = [];

    const value: ArtifactRuleOptions = {};
    const vendorClassSubstrings = validateStringList(o.vendorClassSubstrings, 'vendorClassSubstrings', invalid);
    if (vendorClassSubstrings) value.vendorClassSubstrings = vendorClassSubstrings;
    const unconditionalRemoveAttrs = validateStringList(o.unconditionalRemoveAttrs, 'unconditionalRemoveAttrs', invalid);
    if (unconditionalRemoveAttrs) value.unconditionalRemoveAttrs = unconditionalRemoveAttrs;
    const hrPresentationalAttrs = validateStringList(o.hrPresentationalAttrs, 'hrPresentationalAttrs', invalid);
    if (hrPresentationalAttrs) value.hrPresentationalAttrs = hrPresentationalAttrs;

    const prunableBlockTags = validateStringList(o.prunableBlockTags, 'prunableBlockTags', invalid);
    if (prunableBlockTags) {
        const badTags = prunableBlockTags.filter((tag) => !TAG_NAME.test(tag));
        if (badTags.length) {
            invalid.push(`prunableBlockTags contains invalid tag name(s): ${badTags.join(', ')}`);
        } else {
            value.prunableBlockTags = prunableBlockTags;
        }
    }

    const wordIdPattern = validatePattern(o.wordIdPattern, 'wordIdPattern', invalid);
    if (wordIdPattern !== undefined) value.wordIdPattern = wordIdPattern;
    const msoAnchorPattern = validatePattern(o.msoAnchorPattern, 'msoAnchorPattern', invalid);
    if (msoAnchorPattern !== undefined) value.msoAnchorPattern = msoAnchorPattern;

    if (typeof o.unwrapWrappers === 'boolean') {
        value.unwrapWrappers = o.unwrapWrappers;
    } else if (o.unwrapWrappers !== undefined) {
        invalid.push('unwrapWrappers must be boolean');
    }

    if (invalid.length) {
        return { isValid: false, error: `Invalid option(s): ${invalid.join('; ')}`, value };
    }
    return { isValid: true, value };
}
