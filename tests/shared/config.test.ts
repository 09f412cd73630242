/**
 * ConfigManager Unit Tests
 * Defaults, config file and environment layering
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigManager } from '../../src/shared/config';
import { InvalidArgumentError } from '../../src/evolution-engine/errors';
import logger from '../../src/shared/logger';

// Mock logger to avoid noise
jest.mock('../../src/shared/logger', () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

describe('ConfigManager', () => {
    let dir: string;
    let configPath: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-'));
        configPath = path.join(dir, 'config.json');
        jest.clearAllMocks();
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    function writeConfig(contents: unknown): void {
        fs.writeFileSync(configPath, typeof contents === 'string' ? contents : JSON.stringify(contents));
    }

    it('should fall back to defaults when no file or environment is present', () => {
        const config = new ConfigManager(configPath, {}).get();

        expect(config.store).toEqual({ dbPath: './data/evolution.db', populationSize: 500, archiveSize: 50 });
        expect(config.evolution).toEqual({ eliteRatio: 0.1, explorationRatio: 0.2 });
        expect(config.app.environment).toBe('development');
        expect(config.app.logLevel).toBe('info');
    });

    it('should read the bundled config file by default', () => {
        const config = new ConfigManager(undefined, {}).get();

        expect(config.app.name).toBe('Strategy Evolve Store');
        expect(config.store.populationSize).toBe(500);
    });

    it('should let the file override defaults', () => {
        writeConfig({ store: { populationSize: 200 }, evolution: { eliteRatio: 0.3 } });

        const config = new ConfigManager(configPath, {}).get();

        expect(config.store.populationSize).toBe(200);
        expect(config.store.archiveSize).toBe(50);
        expect(config.evolution).toEqual({ eliteRatio: 0.3, explorationRatio: 0.2 });
    });

    it('should let the environment override the file', () => {
        writeConfig({ store: { populationSize: 200, dbPath: '/tmp/from-file.db' } });

        const manager = new ConfigManager(configPath, {
            EVOLVE_POPULATION_SIZE: '300',
            EVOLVE_DB_PATH: '/tmp/from-env.db',
            EVOLVE_EXPLORATION_RATIO: '0.5',
            NODE_ENV: 'test',
            LOG_LEVEL: 'warn',
        });

        expect(manager.getSection('store')).toEqual({ dbPath: '/tmp/from-env.db', populationSize: 300, archiveSize: 50 });
        expect(manager.getSection('evolution').explorationRatio).toBe(0.5);
        expect(manager.getSection('app').environment).toBe('test');
        expect(manager.getSection('app').logLevel).toBe('warn');
        expect(logger.level).toBe('warn');
    });

    it('should ignore an unrecognised NODE_ENV', () => {
        const config = new ConfigManager(configPath, { NODE_ENV: 'staging' }).get();
        expect(config.app.environment).toBe('development');
    });

    it('should warn and use defaults when the file is not valid JSON', () => {
        writeConfig('{ not json');

        const config = new ConfigManager(configPath, {}).get();

        expect(config.store.populationSize).toBe(500);
        expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('should reject a file with values of the wrong type', () => {
        writeConfig({ store: { populationSize: 'big' } });
        expect(() => new ConfigManager(configPath, {})).toThrow(InvalidArgumentError);
    });

    it('should reject an archive that does not fit in the population', () => {
        expect(() => new ConfigManager(configPath, { EVOLVE_ARCHIVE_SIZE: '600' })).toThrow(
            'store.archiveSize must be smaller than store.populationSize'
        );
    });

    it('should reject a population below the minimum', () => {
        expect(() => new ConfigManager(configPath, { EVOLVE_POPULATION_SIZE: '5', EVOLVE_ARCHIVE_SIZE: '2' })).toThrow(
            InvalidArgumentError
        );
    });

    it('should reject selection ratios that sum above 1', () => {
        expect(() => new ConfigManager(configPath, { EVOLVE_ELITE_RATIO: '0.9' })).toThrow(
            'evolution.eliteRatio + evolution.explorationRatio must be <= 1'
        );
    });

    it('should reject non-numeric environment values', () => {
        expect(() => new ConfigManager(configPath, { EVOLVE_POPULATION_SIZE: 'lots' })).toThrow(
            'EVOLVE_POPULATION_SIZE must be a number, got "lots"'
        );
        expect(() => new ConfigManager(configPath, { EVOLVE_ELITE_RATIO: '' })).toThrow(InvalidArgumentError);
    });

    it('should reject an unknown LOG_LEVEL', () => {
        expect(() => new ConfigManager(configPath, { LOG_LEVEL: 'verbose' })).toThrow('Invalid LOG_LEVEL: verbose');
    });
});
