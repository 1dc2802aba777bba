import { byAttribute, byIdPattern, byName, byRole, byText, chain } from "./locators";

// Login form and post-login shell shared by every section of the portal

export const USERNAME_FIELD = chain(
  "username",
  byName("Username"),
  byAttribute("id", "username"),
  byAttribute("placeholder", "Username", { match: "contains" }),
);

export const PASSWORD_FIELD = chain(
  "password",
  byName("Password"),
  byAttribute("id", "password"),
  byAttribute("type", "password"),
);

export const LOGIN_BUTTON = chain(
  "Accedi",
  byText("Accedi", { tags: ["span"] }),
  byRole("button", "Accedi"),
  byText("Accedi", { exact: false }),
);

export const SETTINGS_BUTTON = chain(
  "user settings",
  byIdPattern("user-info-settings-btnEl"),
  byAttribute("class", "x-btn-icon-el-default-toolbar-small-settings", {
    match: "contains",
  }),
);

/** Present only once the authenticated shell has rendered. */
export const POST_LOGIN_MARKER = chain(
  "post-login marker",
  ...SETTINGS_BUTTON.strategies,
  byText("Report", { tags: ["span"] }),
);

export const SESSION_ACTIVE_YES = chain(
  "session already active: Si",
  byText("Si", { tags: ["span"] }),
  byText("Sì", { tags: ["span"] }),
  byText("Yes", { tags: ["span"] }),
);

export const POPUP_OK = chain("OK", byText("OK", { tags: ["span"] }), byRole("button", "OK"));

export const LOGOUT_OPTION = chain(
  "Esci",
  byText("Esci", { tags: ["span", "a"] }),
  byRole("menuitem", "Esci"),
);
