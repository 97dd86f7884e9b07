import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { importAsset } from './ImportAssetTool.js';
import { commandNames, createMockUnityConnection } from '../testUtils.js';

describe('ImportAssetTool', () => {
    let workDir: string;
    let sourcePath: string;

    beforeEach(async () => {
        workDir = await mkdtemp(join(tmpdir(), 'import-asset-test-'));
        sourcePath = join(workDir, 'crate.fbx');
        await writeFile(sourcePath, 'mesh');
    });

    afterEach(async () => {
        await rm(workDir, { recursive: true, force: true });
    });

    it('should return error for empty source path', async () => {
        const unity = createMockUnityConnection();

        const result = await importAsset({ source_path: '', target_path: 'Assets/crate.fbx' }, unity);

        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe('Error importing asset: source_path must be a valid string');
        expect(unity.sendCommand).not.toHaveBeenCalled();
    });

    it('should return error when the source file does not exist', async () => {
        const unity = createMockUnityConnection();
        const missing = join(workDir, 'missing.fbx');

        const result = await importAsset({ source_path: missing, target_path: 'Assets/crate.fbx' }, unity);

        expect(result.content[0].text).toBe(`Error importing asset: Source file '${missing}' does not exist`);
        expect(unity.sendCommand).not.toHaveBeenCalled();
    });

    it('should refuse to replace an existing asset without overwrite', async () => {
        const unity = createMockUnityConnection(() => ({ assets: [{ path: 'Assets/Props/crate.fbx' }] }));

        const result = await importAsset({ source_path: sourcePath, target_path: 'Assets/Props/crate.fbx' }, unity);

        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe(
            "Asset already exists at 'Assets/Props/crate.fbx'. Use overwrite=true to replace it."
        );
        expect(unity.sendCommand).toHaveBeenCalledWith('GET_ASSET_LIST', {
            search_pattern: 'crate.fbx',
            folder: 'Assets/Props',
        });
        expect(commandNames(unity)).toEqual(['GET_ASSET_LIST']);
    });

    it('should import and report the message from Unity', async () => {
        const unity = createMockUnityConnection((command) =>
            command === 'GET_ASSET_LIST' ? { assets: [] } : { success: true, message: 'Imported crate.fbx' }
        );

        const result = await importAsset(
            { source_path: sourcePath, target_path: 'Assets/Props/crate.fbx', overwrite: false },
            unity
        );

        expect(result.isError).toBeUndefined();
        expect(result.content[0].text).toBe('Imported crate.fbx');
        expect(unity.sendCommand).toHaveBeenLastCalledWith('IMPORT_ASSET', {
            source_path: sourcePath,
            target_path: 'Assets/Props/crate.fbx',
            overwrite: false,
        });
    });

    it('should echo source and target when Unity reports a failure', async () => {
        const unity = createMockUnityConnection((command) =>
            command === 'GET_ASSET_LIST' ? { assets: [] } : { success: false, error: 'Importer crashed' }
        );

        const result = await importAsset({ source_path: sourcePath, target_path: 'Assets/crate.fbx' }, unity);

        expect(result.content[0].text).toBe(
            `Error importing asset: Importer crashed (Source: ${sourcePath}, Target: Assets/crate.fbx)`
        );
    });
});
