import { defineConfig } from 'vite';
import replace from '@rollup/plugin-replace';
import { execSync } from 'node:child_process';
import shebang from 'rollup-plugin-preserve-shebang';

let gitInfo = {
    branch: '',
    commit: '',
    tags: '',
    commitDate: '',
};

try {
    gitInfo = {
        branch: execSync('git rev-parse --abbrev-ref HEAD').toString().trim(),
        commit: execSync('git rev-parse --short HEAD').toString().trim(),
        tags: '',
        commitDate: execSync('git log -1 --format=%cd --date=iso').toString().trim(),
    };

    try {
        gitInfo.tags = execSync('git tag --points-at HEAD | paste -sd "," -').toString().trim();
    } catch {
        gitInfo.tags = '';
    }
} catch {
    // eslint-disable-next-line no-console
    console.log('Directory does not have a Git repository, skipping git info');
}

// `vite build --mode worker` bundles the remote worker into one self-contained file
export default defineConfig(({ mode }) => {
    const worker = mode === 'worker';

    return {
        plugins: [
            replace({
                '__VERSION__': process.env.npm_package_version ?? '',
                '__GIT_BRANCH__': gitInfo.branch,
                '__GIT_COMMIT__': gitInfo.commit,
                '__GIT_TAGS__': gitInfo.tags === '' ? '' : `T:${gitInfo.tags}`,
                '__GIT_COMMIT_DATE__': gitInfo.commitDate,
                '__SYSTEM_INFO__': `${process.platform} ${process.arch} ${process.version}`,
                preventAssignment: true,
            }),
            shebang({
                shebang: '#!/usr/bin/env node',
            }),
        ],
        build: {
            target: 'node20',
            outDir: 'dist',
            ssr: true,
            emptyOutDir: !worker,
            rollupOptions: {
                external: worker
                    ? [/^node:/]
                    : [
                        // Dependencies from package.json
                        '@anthropic-ai/sdk',
                        'commander',
                        'dotenv',
                        'dotenv/config',
                        'fluent-ffmpeg',
                        'js-yaml',
                        'openai',
                        'winston',
                        'zod',
                        // Node.js built-in modules (node: prefix)
                        /^node:/,
                    ],
                input: worker
                    ? { worker: 'src/worker-main.ts' }
                    : { main: 'src/main.ts', index: 'src/index.ts' },
                output: {
                    format: 'esm',
                    entryFileNames: '[name].js',
                    chunkFileNames: '[name].js',
                    inlineDynamicImports: worker,
                },
            },
            modulePreload: false,
            minify: false,
            sourcemap: true,
        },
        ssr: worker ? { noExternal: true } : undefined,
    };
});
