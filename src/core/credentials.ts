import * as crypto from 'crypto'
import * as fs from 'fs'
import * as path from 'path'
import { SSH_PRIVATE_KEY_FILENAME, SSH_PUBLIC_KEY_FILENAME } from './const'
import { CredentialsMissingError } from './errors/provisioning'

export interface ApiCredentials {
    secretId: string
    secretKey: string
}

export interface GeneratedKeyPair {
    privateKeyPath: string
    /** OpenSSH authorized_keys line */
    publicKey: string
}

const CREDENTIAL_ENV_VARS: ReadonlyArray<{ id: string, key: string }> = [
    { id: 'TENCENTCLOUD_SECRET_ID', key: 'TENCENTCLOUD_SECRET_KEY' },
    { id: 'TENCENT_SECRET_ID', key: 'TENCENT_SECRET_KEY' },
]

/**
 * Resolve provider API credentials from the environment prepared by the calling layer.
 * Never prompts.
 */
export function resolveApiCredentials(env: NodeJS.ProcessEnv = process.env): ApiCredentials {
    for (const vars of CREDENTIAL_ENV_VARS) {
        const secretId = env[vars.id]?.trim()
        const secretKey = env[vars.key]?.trim()
        if (secretId && secretKey) {
            return { secretId, secretKey }
        }
    }
    throw new CredentialsMissingError({ expected: CREDENTIAL_ENV_VARS.map(v => `${v.id}/${v.key}`) })
}

// SSH wire encoding: uint32 length prefix followed by bytes
function sshString(data: Buffer): Buffer {
    const length = Buffer.alloc(4)
    length.writeUInt32BE(data.length, 0)
    return Buffer.concat([length, data])
}

// SSH mpint: big-endian two's complement, positive values get a leading zero byte if high bit is set
function sshMpint(data: Buffer): Buffer {
    let start = 0
    while (start < data.length - 1 && data[start] === 0) {
        start++
    }
    let value = data.subarray(start)
    if (value.length > 0 && (value[0] & 0x80) !== 0) {
        value = Buffer.concat([Buffer.from([0]), value])
    }
    return sshString(value)
}

/**
 * Format an RSA public key as an OpenSSH `ssh-rsa` line.
 */
export function toOpenSshPublicKey(publicKey: crypto.KeyObject, comment: string): string {
    const jwk = publicKey.export({ format: 'jwk' })
    if (jwk.kty !== 'RSA' || jwk.n === undefined || jwk.e === undefined) {
        throw new Error(`Expected an RSA public key, got ${jwk.kty ?? 'unknown'} key`)
    }
    const blob = Buffer.concat([
        sshString(Buffer.from('ssh-rsa')),
        sshMpint(Buffer.from(jwk.e, 'base64url')),
        sshMpint(Buffer.from(jwk.n, 'base64url')),
    ])
    return `ssh-rsa ${blob.toString('base64')} ${comment}`
}

/**
 * Generate a key pair for the compute node login account.
 *
 * Private key is written as PEM (readable by OpenSSH) with owner-only permissions,
 * public key as an OpenSSH line beside it.
 */
export async function generateKeyPair(destDir: string, comment: string = 'cloudforge'): Promise<GeneratedKeyPair> {
    await fs.promises.mkdir(destDir, { recursive: true, mode: 0o700 })

    const { publicKey, privateKey } = crypto.generateKeyPairSync('rsa', { modulusLength: 3072 })

    const privateKeyPath = path.join(destDir, SSH_PRIVATE_KEY_FILENAME)
    const publicKeyPath = path.join(destDir, SSH_PUBLIC_KEY_FILENAME)
    const publicKeyLine = toOpenSshPublicKey(publicKey, comment)

    await fs.promises.writeFile(privateKeyPath, privateKey.export({ type: 'pkcs1', format: 'pem' }), { mode: 0o600 })
    // mode is only applied on creation
    await fs.promises.chmod(privateKeyPath, 0o600)
    await fs.promises.writeFile(publicKeyPath, publicKeyLine + '\n', { mode: 0o644 })

    return { privateKeyPath, publicKey: publicKeyLine }
}
