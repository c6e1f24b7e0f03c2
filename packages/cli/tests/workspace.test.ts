import { describe, it, expect, vi, beforeEach } from 'vitest';
import { detectWorkspaceRoot } from '../src/workspace/detect.js';
import { resolveWorkspace, resolveBundledReferencePath, getReportPath } from '../src/workspace/paths.js';
import * as fs from 'node:fs';
import * as path from 'node:path';

// Mocking fs to avoid actual disk I/O in simple unit tests
vi.mock('node:fs');

describe('Workspace Detection', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should detect workspace root when config/catalog.yaml exists', () => {
        const mockCwd = '/Users/test/projects/my-cards';
        vi.spyOn(process, 'cwd').mockReturnValue(mockCwd);

        vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => {
            return p.toString() === path.join(mockCwd, 'config', 'catalog.yaml');
        });

        expect(detectWorkspaceRoot()).toBe(mockCwd);
    });

    it('should bubble up from a nested directory', () => {
        vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => {
            return p.toString() === path.join('/work', 'config', 'catalog.yaml');
        });

        expect(detectWorkspaceRoot('/work/outputs/2026')).toBe('/work');
    });

    it('should return null if no workspace is found in parents', () => {
        vi.spyOn(fs, 'existsSync').mockReturnValue(false);

        expect(detectWorkspaceRoot('/')).toBeNull();
    });
});

describe('Path Resolution', () => {
    const root = '/work';

    it('should resolve standard paths correctly', () => {
        const workspace = resolveWorkspace(root);
        expect(workspace.root).toBe(root);
        expect(workspace.outputs).toBe(path.join(root, 'outputs'));
        expect(workspace.config.catalogPath).toBe(path.join(root, 'config', 'catalog.yaml'));
        expect(workspace.config.settingsPath).toBe(path.join(root, 'config', 'settings.yaml'));
        expect(workspace.config.referencePath).toBe(path.join(root, 'config', 'reference.yaml'));
    });

    it('should default the report path to outputs/recommendations.xlsx', () => {
        const workspace = resolveWorkspace(root);
        expect(getReportPath(workspace)).toBe(path.join(root, 'outputs', 'recommendations.xlsx'));
        expect(getReportPath(workspace, 'gas.xlsx')).toBe(path.join(root, 'outputs', 'gas.xlsx'));
    });

    it('should find the bundled reference file from a build directory', () => {
        const bundled = path.join('/repo', 'packages', 'cli', 'assets', 'reference.yaml');
        vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => p.toString() === bundled);

        expect(resolveBundledReferencePath(path.join('/repo', 'packages', 'cli', 'dist', 'workspace'))).toBe(bundled);
    });

    it('should find the bundled reference file from the repository root', () => {
        const bundled = path.join('/repo', 'packages', 'cli', 'assets', 'reference.yaml');
        vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => p.toString() === bundled);

        expect(resolveBundledReferencePath('/repo')).toBe(bundled);
    });
});
