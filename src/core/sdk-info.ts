import { arch, platform, release } from 'os'
import pkg from '../../package.json' with { type: 'json' }

export const SDK_NAME = 'transcriptic-node'
export const SDK_VERSION = pkg.version
export const USER_AGENT = `${SDK_NAME}/${SDK_VERSION} (node/${process.versions.node}; ${platform()}/${release()}; ${arch()})`
