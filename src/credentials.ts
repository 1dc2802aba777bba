import { inspect } from "util";
import { config } from "./config";

const REDACTED = "***";

/**
 * Username/password pair handed over once by the caller.
 * The password is held in a closure so that JSON serialisation,
 * util.inspect and winston metadata never see it.
 */
export class Credentials {
  readonly username: string;
  private readonly readPassword: () => string;

  constructor(username: string, password: string) {
    this.username = username;
    this.readPassword = () => password;
  }

  /** Credentials from PORTAL_USERNAME / PORTAL_PASSWORD. */
  static fromConfig(): Credentials {
    return new Credentials(config.portal.username, config.portal.password);
  }

  get password(): string {
    return this.readPassword();
  }

  get isComplete(): boolean {
    return this.username.length > 0 && this.readPassword().length > 0;
  }

  toJSON(): { username: string; password: string } {
    return { username: this.username, password: REDACTED };
  }

  toString(): string {
    return `Credentials(${this.username})`;
  }

  [inspect.custom](): string {
    return this.toString();
  }
}
