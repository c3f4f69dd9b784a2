import type { Config } from '../src/config';

export const config: Config = {
    appRoot: './app',
    catalog: './catalog.json',
    // the binding layer's own wrapper modules would match everything
    ignore: ['**/node_modules/**', '**/*.d.ts', 'lib/qt-wrappers/**'],
    keepMembers: {
        QTimer: ['singleShot'],
    },
    output: './rejections.xml',
    packageName: 'PySide.QtGui',
    logLevel: 'info',
    progress: true,
};
