import { loadConfig } from './config';
import { ArgumentError } from './escrow/errors';

describe('loadConfig', () => {
    it('defaults to info with no admin MSP', () => {
        expect(loadConfig({})).toEqual({ logLevel: 'info', adminMspId: undefined });
    });

    it('normalizes the log level and reads the admin MSP', () => {
        expect(loadConfig({ ESCROW_LOG_LEVEL: ' DEBUG ', ESCROW_ADMIN_MSP: 'Org1MSP' }))
            .toEqual({ logLevel: 'debug', adminMspId: 'Org1MSP' });
    });

    it('treats a blank admin MSP as unset', () => {
        expect(loadConfig({ ESCROW_ADMIN_MSP: '  ' }).adminMspId).toBeUndefined();
    });

    it('rejects an unknown log level', () => {
        expect(() => loadConfig({ ESCROW_LOG_LEVEL: 'verbose' })).toThrow(ArgumentError);
    });
});
