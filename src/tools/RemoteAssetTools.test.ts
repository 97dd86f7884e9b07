import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { importRemoteAsset } from './ImportRemoteAssetTool.js';
import { batchImportRemoteAssets } from './BatchImportRemoteAssetsTool.js';
import { RemoteAssetImporter } from '../remote/RemoteAssetImporter.js';
import { DownloadOptions } from '../remote/downloadToFile.js';
import { CommandHandler, createMockUnityConnection } from '../testUtils.js';

describe('remote asset tools', () => {
    let workDir: string;

    beforeEach(async () => {
        workDir = await mkdtemp(join(tmpdir(), 'remote-tools-test-'));
    });

    afterEach(async () => {
        await rm(workDir, { recursive: true, force: true });
    });

    function createImporter(handler: CommandHandler = () => ({ assets: [], success: true })) {
        const unity = createMockUnityConnection(handler);
        const download = vi.fn(async (_url: string, destination: string, _options: DownloadOptions) => {
            await writeFile(destination, 'bytes');
        });
        const importer = new RemoteAssetImporter({ unity, cacheRoot: join(workDir, 'cache'), download });
        return { unity, download, importer };
    }

    it('should use temp storage unless told otherwise', async () => {
        const { download, importer } = createImporter();

        const result = await importRemoteAsset({ url: 'https://cdn.test/rock.fbx', target_path: 'Rocks/rock.fbx' }, importer);

        expect(result.isError).toBeUndefined();
        expect(result.content[0].text).toBe('Asset imported from https://cdn.test/rock.fbx to Assets/Rocks/rock.fbx');
        expect(download.mock.calls[0][1]).not.toBe(join(workDir, 'cache', 'rock.fbx'));
    });

    it('should download into the cache when temp_download is false', async () => {
        const { download, importer } = createImporter();

        await importRemoteAsset(
            { url: 'https://cdn.test/rock.fbx', target_path: 'Assets/rock.fbx', temp_download: false },
            importer
        );

        expect(download.mock.calls[0][1]).toBe(join(workDir, 'cache', 'rock.fbx'));
    });

    it('should flag a pre-existing asset as an error result', async () => {
        const { importer } = createImporter(() => ({ assets: [{ path: 'Assets/rock.fbx' }], success: true }));

        const result = await importRemoteAsset({ url: 'https://cdn.test/rock.fbx', target_path: 'Assets/rock.fbx' }, importer);

        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe("Asset already exists at 'Assets/rock.fbx'. Use overwrite=true to replace it.");
    });

    it('should report an empty batch without contacting Unity', async () => {
        const { unity, importer } = createImporter();

        const result = await batchImportRemoteAssets({ urls: [] }, importer);

        expect(result.content[0].text).toBe('No URLs provided; nothing to import.');
        expect(unity.sendCommand).not.toHaveBeenCalled();
    });

    it('should list one line per URL for a batch', async () => {
        const { importer } = createImporter();

        const result = await batchImportRemoteAssets(
            { urls: ['https://cdn.test/a.png', 'https://cdn.test/b.png'], target_folder: 'Assets/Icons' },
            importer
        );

        expect(result.isError).toBeUndefined();
        expect(result.content[0].text).toBe(
            '[1/2] a.png: Asset imported from https://cdn.test/a.png to Assets/Icons/a.png\n' +
                '[2/2] b.png: Asset imported from https://cdn.test/b.png to Assets/Icons/b.png'
        );
    });
});
