import type { ElementSnapshot } from '../bot/page-driver';
import type { BrowserLauncher } from '../bot/browser-launcher';
import type { ProfileLock } from '../bot/profile-lock';
import { FakePortal } from './fake-portal';
import { button, element, input } from './elements';

export const PORTAL_URL = 'https://portal.test/Ui/';

export interface PortalScript {
  username?: string;
  password?: string;
  /** Number of login submissions that are rejected before one succeeds. */
  rejectedLogins?: number;
  sessionPopup?: boolean;
  /** Called on every portal after a successful login, to add a section's elements. */
  onLoggedIn?: (portal: FakePortal) => void;
}

export function loginScreen(): ElementSnapshot[] {
  return [
    input('Username', { ref: 'login-user' }),
    input('Password', { ref: 'login-pass', type: 'password' }),
    button('login-submit', 'Accedi'),
  ];
}

export function shellScreen(): ElementSnapshot[] {
  return [
    element({
      ref: 'settings',
      tag: 'span',
      id: 'user-info-settings-btnEl',
      classes: ['x-btn-button'],
    }),
    button('menu-report', 'Report'),
  ];
}

/**
 * Launcher that hands out scripted FakePortal tabs: a login form that accepts
 * the scripted credentials and then renders the portal shell.
 */
export function createPortalLauncher(script: PortalScript = {}) {
  const { username = 'test-user', password = 'test-secret' } = script;
  const portals: FakePortal[] = [];
  let submissions = 0;

  const renderLogin = (portal: FakePortal) => {
    portal.setElements(loginScreen());
    portal.setUrl(`${PORTAL_URL}#login`);
  };

  const renderShell = (portal: FakePortal) => {
    portal.setElements(shellScreen());
    portal.setUrl(`${PORTAL_URL}#home`);
    portal.onClick('settings', (p) => p.addElements(button('logout', 'Esci')));
    portal.onClick('logout', (p) => renderLogin(p));
    script.onLoggedIn?.(portal);
  };

  const install = (portal: FakePortal) => {
    portal.onGoto((p) => renderLogin(p));
    portal.onClick('login-submit', (p) => {
      submissions += 1;
      const accepted =
        submissions > (script.rejectedLogins ?? 0) &&
        p.valueOf('login-user') === username &&
        p.valueOf('login-pass') === password;
      if (!accepted) {
        p.addElements(element({ ref: 'login-error', text: 'Credenziali non valide' }));
        return;
      }
      if (script.sessionPopup) {
        p.setElements([
          element({ ref: 'popup-title', tag: 'span', text: 'Attenzione' }),
          button('popup-yes', 'Si'),
        ]);
        p.onClick('popup-yes', renderShell);
        return;
      }
      renderShell(p);
    });
  };

  const launcher: BrowserLauncher = async () => {
    const portal = new FakePortal();
    install(portal);
    portals.push(portal);
    return portal;
  };

  return {
    launcher,
    portals,
    current: (): FakePortal => {
      const portal = portals[portals.length - 1];
      if (!portal) throw new Error('No portal launched yet');
      return portal;
    },
    submissions: () => submissions,
    renderLogin,
  };
}

export function fakeProfileLock() {
  const state = { acquired: 0, released: 0 };
  const lockProfile = async (profileDirectory: string): Promise<ProfileLock> => {
    state.acquired += 1;
    return {
      lockPath: `${profileDirectory}/.portal-bot.lock`,
      release: async () => {
        state.released += 1;
      },
    };
  };
  return { lockProfile, state };
}

export const FAST_TIMING = {
  stepTimeoutMs: 150,
  overlayTimeoutMs: 150,
  pageLoadTimeoutMs: 150,
  markerTimeoutMs: 50,
};
