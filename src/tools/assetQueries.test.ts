import { describe, it, expect } from 'vitest';
import { normalizeAssetPath, splitAssetPath, withPrefabExtension } from './assetQueries.js';

describe('assetQueries', () => {
    it('should root paths under Assets', () => {
        expect(normalizeAssetPath('Assets/Models/tree.fbx')).toBe('Assets/Models/tree.fbx');
        expect(normalizeAssetPath('Models/tree.fbx')).toBe('Assets/Models/tree.fbx');
        expect(normalizeAssetPath('/Models/tree.fbx')).toBe('Assets/Models/tree.fbx');
    });

    it('should split folder and file name', () => {
        expect(splitAssetPath('Assets/Models/tree.fbx')).toEqual({ folder: 'Assets/Models', fileName: 'tree.fbx' });
        expect(splitAssetPath('tree.fbx')).toEqual({ folder: '', fileName: 'tree.fbx' });
    });

    it('should add the prefab extension only when missing', () => {
        expect(withPrefabExtension('Assets/Door')).toBe('Assets/Door.prefab');
        expect(withPrefabExtension('Assets/Door.PREFAB')).toBe('Assets/Door.PREFAB');
    });
});
