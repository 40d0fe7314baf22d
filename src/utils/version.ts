// Read version from package.json so --version and User-Agent track releases
const pkg: { version: string } = require('../../package.json');

export const VERSION = pkg.version;
