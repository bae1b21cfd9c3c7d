import { InvalidURLError, RequestBuilder, VERSION, toDispatchOptions } from '../src/index.js';

describe('request-builder imports', () => {
    it('should export VERSION', () => {
        expect(VERSION).toBe('0.1.0');
    });

    it('should export the builder and its error', () => {
        expect(() => new RequestBuilder().build()).toThrow(InvalidURLError);
    });

    it('should export toDispatchOptions', () => {
        expect(toDispatchOptions).toBeDefined();
    });
});
