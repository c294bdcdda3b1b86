import { maskIdentifier } from '~util/console-util';

/**
 * An immutable set of TencentCloud credentials. Long-lived credentials carry an empty
 * session token, temporary credentials obtained through STS carry a non-empty one.
 */
export class Credential {
    public readonly id: string;
    public readonly secret: string;
    public readonly sessionToken: string;

    constructor(id: string, secret: string, sessionToken = '') {
        this.id = id;
        this.secret = secret;
        this.sessionToken = sessionToken;
        Object.freeze(this);
    }

    public isUsable(): boolean {
        return this.id !== '' && this.secret !== '';
    }

    public isTemporary(): boolean {
        return this.sessionToken !== '';
    }

    public equals(other: Credential): boolean {
        return this.id === other.id
            && this.secret === other.secret
            && this.sessionToken === other.sessionToken;
    }

    public toString(): string {
        return `Credential(${maskIdentifier(this.id)}${this.isTemporary() ? ', temporary' : ''})`;
    }

    public toJSON(): { id: string; temporary: boolean } {
        return { id: maskIdentifier(this.id), temporary: this.isTemporary() };
    }
}
