import { describe, it, expect } from 'vitest';
import zkerror from 'node-zklib/zkerror';
import { DeviceUnavailableError, errorMessage } from './errors';

describe('errorMessage', () => {
    it('uses the message of an Error', () => {
        expect(errorMessage(new DeviceUnavailableError('device offline'))).toBe('device offline');
    });

    it('unwraps the socket error inside a ZKError', () => {
        const error = new zkerror.ZKError(
            { code: 'ETIMEDOUT', message: 'connect ETIMEDOUT 10.0.0.9:4370' },
            'TCP CONNECT',
            '10.0.0.9'
        );

        expect(errorMessage(error)).toBe('connect ETIMEDOUT 10.0.0.9:4370');
    });

    it('unwraps nested wrappers down to an Error', () => {
        expect(errorMessage({ err: { err: new Error('Socket isn\'t connected !') } })).toBe("Socket isn't connected !");
    });

    it('falls back to the string form', () => {
        expect(errorMessage('boom')).toBe('boom');
        expect(errorMessage(42)).toBe('42');
    });
});
