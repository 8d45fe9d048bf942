//
// Global constants
//

export const CLOUDFORGE_VERSION = '0.1.0'

export const CLOUDFORGE_HOME_DIRNAME = '.cloudforge'
export const CLOUDFORGE_SESSION_DIRNAME = 'session'
export const SESSION_ID_PREFIX = 'session_'

export const DEFAULT_REGION = 'ap-guangzhou'
export const DEFAULT_LOGIN_ACCOUNT = 'ubuntu'
export const DEFAULT_NAME_PREFIX = 'cloudforge'

// Ubuntu 22.04 public image
export const DEFAULT_IMAGE_ID = 'img-487zeit5'

export const NETWORK_CIDR_BLOCK = '10.0.0.0/16'

export const MIN_COMPUTE_DISK_GB = 20

export const DATABASE_PORT = 3306
export const DATABASE_ROOT_USERNAME = 'root'
export const DATABASE_ENGINE_VERSIONS = ['5.6', '5.7', '8.0'] as const
export type DatabaseEngineVersion = typeof DATABASE_ENGINE_VERSIONS[number]

export const GPU_CLASS_NONE = 'none'

export const SSH_PRIVATE_KEY_FILENAME = 'ssh_key'
export const SSH_PUBLIC_KEY_FILENAME = 'ssh_key.pub'
export const RESOURCES_SUMMARY_FILENAME = 'resources.json'
