import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { PromptService, PromptServiceDependencies } from '../src/services/PromptService';
import { FullPromptsConfig } from '../src/services/promptTypes';
import { rejectionOf } from './helpers/fakes';

const DEFAULT_DIR = '/bundled/prompts';

function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

describe('PromptService', () => {
    let files: Map<string, string>;
    let readFileFn: sinon.SinonSpy<[string, BufferEncoding], Promise<string>>;
    let dependencies: PromptServiceDependencies;

    beforeEach(() => {
        files = new Map();
        readFileFn = sinon.spy(async (filePath: string, _encoding: BufferEncoding) => {
            const data = files.get(filePath);
            if (data === undefined) {
                throw new Error(`ENOENT: ${filePath}`);
            }
            return data;
        });
        dependencies = {
            readFileFn,
            resolvePathFn: (...paths: string[]) => paths.join('/'),
            dirnameFn: (p: string) => p.substring(0, p.lastIndexOf('/')),
            isAbsoluteFn: (p: string) => p.startsWith('/'),
            defaultPromptsDir: DEFAULT_DIR,
        };
    });

    afterEach(() => {
        sinon.restore();
    });

    describe('default prompts', () => {
        it('should read the bundled template and fill in every placeholder', async () => {
            files.set(`${DEFAULT_DIR}/Summarizer/summarize.txt`, 'Summarize in {{maxLength}} chars: {{content}} ({{maxLength}})');
            const service = new PromptService(undefined, dependencies);

            const prompt = await service.getFormattedPrompt('Summarizer', 'summarize', { maxLength: 40, content: 'Rain' });

            expect(prompt).to.equal('Summarize in 40 chars: Rain (40)');
            expect(readFileFn.calledOnceWithExactly(`${DEFAULT_DIR}/Summarizer/summarize.txt`, 'utf-8')).to.be.true;
        });

        it('should insert values containing replacement patterns literally', async () => {
            files.set(`${DEFAULT_DIR}/Generation/system.txt`, 'Memories:\n{{memories}}');
            const service = new PromptService(undefined, dependencies);

            const prompt = await service.getFormattedPrompt('Generation', 'system', { memories: 'cost $& and $1' });

            expect(prompt).to.equal('Memories:\ncost $& and $1');
        });

        it('should leave placeholders without a value untouched', async () => {
            files.set(`${DEFAULT_DIR}/Generation/system.txt`, '{{context}} / {{memories}}');
            const service = new PromptService(undefined, dependencies);

            expect(await service.getFormattedPrompt('Generation', 'system', { context: 'Fog' })).to.equal('Fog / {{memories}}');
        });

        it('should report a missing default template', async () => {
            const service = new PromptService(undefined, dependencies);

            const error = await rejectionOf(service.getFormattedPrompt('Generation', 'missing', {}));

            expect(messageOf(error)).to.contain(`Error loading default prompt file ${DEFAULT_DIR}/Generation/missing.txt`);
        });

        it('should reject an empty template', async () => {
            files.set(`${DEFAULT_DIR}/Generation/system.txt`, '');
            const service = new PromptService(undefined, dependencies);

            const error = await rejectionOf(service.getFormattedPrompt('Generation', 'system', {}));

            expect(messageOf(error)).to.equal('Failed to load prompt for agent Generation, prompt system.');
        });
    });

    describe('custom prompt configuration', () => {
        const configPath = '/work/prompts.json';
        const config: FullPromptsConfig = {
            prompts: {
                Generation: {
                    system: { inputs: ['context', 'memories'], path: 'custom/system.txt' },
                },
                Summarizer: {
                    summarize: { inputs: ['content'], path: '/abs/summarize.txt' },
                },
            },
        };

        beforeEach(() => {
            files.set(configPath, JSON.stringify(config));
            files.set('/work/custom/system.txt', 'Custom: {{context}}');
            files.set('/abs/summarize.txt', 'Absolute: {{content}}');
            files.set(`${DEFAULT_DIR}/Other/prompt.txt`, 'Default: {{value}}');
        });

        it('should resolve relative custom paths against the configuration directory', async () => {
            const service = new PromptService(configPath, dependencies);
            expect(await service.getFormattedPrompt('Generation', 'system', { context: 'Fog' })).to.equal('Custom: Fog');
        });

        it('should use absolute custom paths as given', async () => {
            const service = new PromptService(configPath, dependencies);
            expect(await service.getFormattedPrompt('Summarizer', 'summarize', { content: 'Rain' })).to.equal('Absolute: Rain');
        });

        it('should fall back to the bundled template for prompts the configuration does not override', async () => {
            const service = new PromptService(configPath, dependencies);
            expect(await service.getFormattedPrompt('Other', 'prompt', { value: 1 })).to.equal('Default: 1');
        });

        it('should read the configuration file only once', async () => {
            const service = new PromptService(configPath, dependencies);
            await service.getFormattedPrompt('Generation', 'system', { context: 'a' });
            await service.getFormattedPrompt('Generation', 'system', { context: 'b' });

            expect(readFileFn.getCalls().filter(call => call.args[0] === configPath)).to.have.length(1);
        });

        it('should report an unreadable configuration file', async () => {
            const service = new PromptService('/work/missing.json', dependencies);

            const error = await rejectionOf(service.getFormattedPrompt('Generation', 'system', {}));

            expect(messageOf(error)).to.contain('Failed to load or parse prompt configuration file: /work/missing.json');
        });

        it('should reject a configuration without a prompts key', async () => {
            files.set(configPath, JSON.stringify({ agents: {} }));
            const service = new PromptService(configPath, dependencies);

            const error = await rejectionOf(service.getFormattedPrompt('Generation', 'system', {}));

            expect(messageOf(error)).to.contain('Prompt configuration must be an object with a "prompts" key.');
        });

        it('should reject a prompts value that is not an object', async () => {
            files.set(configPath, JSON.stringify({ prompts: 'Generation/system.txt' }));
            const service = new PromptService(configPath, dependencies);

            const error = await rejectionOf(service.getFormattedPrompt('Generation', 'system', {}));

            expect(messageOf(error)).to.contain('"prompts" must be an object.');
        });

        it('should name the entry that lacks a path', async () => {
            files.set(configPath, JSON.stringify({ prompts: { Generation: { system: { inputs: ['context'] } } } }));
            const service = new PromptService(configPath, dependencies);

            const error = await rejectionOf(service.getFormattedPrompt('Generation', 'system', {}));

            expect(messageOf(error)).to.contain('Invalid prompt configuration at prompts.Generation.system.path: Required');
        });

        it('should accept entries without an inputs list', async () => {
            files.set(configPath, JSON.stringify({ prompts: { Generation: { system: { path: 'custom/system.txt' } } } }));
            const service = new PromptService(configPath, dependencies);

            expect(await service.getFormattedPrompt('Generation', 'system', { context: 'Fog' })).to.equal('Custom: Fog');
        });

        it('should report a missing custom template', async () => {
            files.delete('/work/custom/system.txt');
            const service = new PromptService(configPath, dependencies);

            const error = await rejectionOf(service.getFormattedPrompt('Generation', 'system', {}));

            expect(messageOf(error)).to.contain(
                'Error loading custom prompt file /work/custom/system.txt for agent Generation, prompt system.'
            );
        });
    });
});
