import { expect } from 'chai';
import * as sinon from 'sinon';
import { OpenAIClient } from '../../src/agents/OpenAIClient';
import { OPENAI_API_KEY_ENV_VAR } from '../../src/agents/llmConstants';
import { ConfigurationError } from '../../src/errors';
import { thrownBy } from '../helpers';

type LLMUtilsModule = typeof import('../../src/agents/LLMUtils');

let warnStub: sinon.SinonStub;
let logStub: sinon.SinonStub;
let errorStub: sinon.SinonStub;

// Keep track of original env vars to restore them
const originalEnv = { ...process.env };

const modulePath = require.resolve('../../src/agents/LLMUtils');

// Re-import to reset the singleton instance
const getFactoryFunction = (): LLMUtilsModule['getLLMClient'] => {
    delete require.cache[modulePath];
    const freshLLMUtils: LLMUtilsModule = require(modulePath);
    return freshLLMUtils.getLLMClient;
};

describe('LLMUtils - getLLMClient Factory', () => {

    beforeEach(() => {
        process.env = { ...originalEnv };
        delete process.env[OPENAI_API_KEY_ENV_VAR];

        warnStub = sinon.stub(console, 'warn');
        logStub = sinon.stub(console, 'log');
        errorStub = sinon.stub(console, 'error');
        sinon.stub(console, 'debug');
        delete require.cache[modulePath];
    });

    afterEach(() => {
        sinon.restore();
        process.env = { ...originalEnv };
        delete require.cache[modulePath];
    });

    it('should return an OpenAIClient when the API key is set', () => {
        const getLLMClient = getFactoryFunction();
        process.env[OPENAI_API_KEY_ENV_VAR] = 'test-key';
        const client = getLLMClient();
        expect(client).to.be.instanceOf(OpenAIClient);
        expect(logStub.calledWith('Using OpenAI provider.')).to.be.true;
    });

    it('should warn and throw a ConfigurationError if OPENAI_API_KEY is missing', () => {
        const getLLMClient = getFactoryFunction();
        const error = thrownBy(() => getLLMClient());
        expect(error).to.be.instanceOf(ConfigurationError);
        expect(error.message).to.contain('OpenAI API key (OPENAI_API_KEY) is not set');
        expect(warnStub.calledWith(sinon.match(/OPENAI_API_KEY\) is not set/))).to.be.true;
        expect(errorStub.calledWith(sinon.match(/Failed to initialize OpenAIClient/))).to.be.true;
    });

    it('should return the same client instance on subsequent calls (singleton)', () => {
        const getLLMClient = getFactoryFunction();
        process.env[OPENAI_API_KEY_ENV_VAR] = 'test-key';
        const client1 = getLLMClient();
        const initialLogCount = logStub.withArgs('Using OpenAI provider.').callCount;
        const client2 = getLLMClient();
        expect(client1).to.equal(client2);
        expect(logStub.withArgs('Using OpenAI provider.').callCount).to.equal(initialLogCount);
    });
});
