import { Config, loadConfig, validateConfig } from '../../../src/config';

const KEYS = [
    'PORT',
    'ALLOWED_ORIGINS',
    'OPENROUTER_API_KEY',
    'MODELSLAB_API_KEY',
    'MAX_CONCURRENT_JOBS',
    'PANELS_PER_PAGE',
    'PERSIST_JOBS',
    'JOBS_PERSISTENCE_PATH',
    'LLM_TEMPERATURE',
    'MAX_TARGET_PAGES',
];

describe('config', () => {
    const saved: Record<string, string | undefined> = {};

    beforeEach(() => {
        for (const key of KEYS) {
            saved[key] = process.env[key];
            delete process.env[key];
        }
    });

    afterEach(() => {
        for (const key of KEYS) {
            if (saved[key] === undefined) {
                delete process.env[key];
            } else {
                process.env[key] = saved[key];
            }
        }
    });

    describe('loadConfig', () => {
        it('should fall back to defaults', () => {
            const config = loadConfig();

            expect(config.port).toBe(3000);
            expect(config.allowedOrigins).toEqual(['*']);
            expect(config.openrouterApiKey).toBe('');
            expect(config.maxConcurrentJobs).toBe(2);
            expect(config.panelsPerPage).toBe(4);
            expect(config.jobsPersistencePath).toBe('./data/jobs.json');
        });

        it('should read numbers, lists and quoted values', () => {
            process.env.PORT = '8080';
            process.env.ALLOWED_ORIGINS = 'https://a.example.com, https://b.example.com,';
            process.env.OPENROUTER_API_KEY = '"test-secret"';
            process.env.LLM_TEMPERATURE = '0.4';

            const config = loadConfig();

            expect(config.port).toBe(8080);
            expect(config.allowedOrigins).toEqual(['https://a.example.com', 'https://b.example.com']);
            expect(config.openrouterApiKey).toBe('test-secret');
            expect(config.llmTemperature).toBe(0.4);
        });

        it('should keep jobs in memory when persistence is off', () => {
            process.env.PERSIST_JOBS = 'false';

            expect(loadConfig().jobsPersistencePath).toBeUndefined();
        });

        it('should reject a number that does not parse', () => {
            process.env.MAX_CONCURRENT_JOBS = 'many';

            expect(() => loadConfig()).toThrow('Environment variable MAX_CONCURRENT_JOBS must be a number, got: many');
        });
    });

    describe('validateConfig', () => {
        function validConfig(overrides: Partial<Config> = {}): Config {
            return { ...loadConfig(), ...overrides };
        }

        it('should accept the defaults', () => {
            expect(validateConfig(validConfig())).toEqual([]);
        });

        it('should list every problem', () => {
            const errors = validateConfig(validConfig({
                maxConcurrentJobs: 0,
                panelsPerPage: 2.5,
                minTargetPages: 10,
                maxTargetPages: 5,
                providerMaxRetries: -1,
                videoPollIntervalMs: 1000,
                videoClipTimeoutMs: 500,
            }));

            expect(errors).toEqual([
                'MAX_CONCURRENT_JOBS must be a positive integer',
                'PANELS_PER_PAGE must be a positive integer',
                'MIN_TARGET_PAGES cannot be greater than MAX_TARGET_PAGES',
                'PROVIDER_MAX_RETRIES must be zero or a positive integer',
                'VIDEO_CLIP_TIMEOUT_MS must be at least VIDEO_POLL_INTERVAL_MS',
            ]);
        });
    });
});
