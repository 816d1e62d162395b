import type { BrowserDriver } from "../driver";
import type { Credentials } from "../../domain/models";
import { AuthError } from "../../core/errors";
import { logger } from "../../core/logger";
import { LINKEDIN_SELECTORS, authLocator } from "./selectors";

export interface LoginOptions {
  timeoutMs: number;
  loginUrl?: string;
}

/** Covers /login, /uas/login and /checkpoint/lg/login-submit. */
export function isPostLoginUrl(url: URL): boolean {
  return !/\/login/i.test(url.pathname);
}

function firstSignal<T>(candidates: Array<Promise<T | null>>): Promise<T | null> {
  return new Promise((resolve, reject) => {
    let pending = candidates.length;
    for (const candidate of candidates) {
      candidate.then((value) => {
        pending--;
        if (value !== null) resolve(value);
        else if (pending === 0) resolve(null);
      }, reject);
    }
  });
}

type LoginSignal = "navigated" | "indicator" | "rejected";

function signalWhen(wait: Promise<boolean>, signal: LoginSignal): Promise<LoginSignal | null> {
  return wait.then((ok) => (ok ? signal : null));
}

function waitForPostLoginSignal(driver: BrowserDriver, timeoutMs: number): Promise<LoginSignal | null> {
  return firstSignal<LoginSignal>([
    signalWhen(driver.waitForUrl(isPostLoginUrl, timeoutMs), "navigated"),
    signalWhen(driver.waitForSelector(authLocator.any("LOGGED_IN_INDICATOR"), timeoutMs), "indicator"),
    signalWhen(driver.waitForSelector(authLocator.any("LOGIN_ERROR"), timeoutMs, "visible"), "rejected"),
  ]);
}

export async function performLogin(
  driver: BrowserDriver,
  credentials: Credentials,
  options: LoginOptions,
): Promise<void> {
  const loginUrl = options.loginUrl ?? LINKEDIN_SELECTORS.LOGIN_URL;
  logger.info({ loginUrl, email: credentials.email }, "Submitting login form");

  await driver.goto(loginUrl);

  const usernameInput = await authLocator.findFirst(driver, "USERNAME_INPUT");
  const passwordInput = await authLocator.findFirst(driver, "PASSWORD_INPUT");
  if (!usernameInput || !passwordInput) {
    throw new AuthError(
      `Login form fields not found on ${driver.currentUrl()} (selector table ${authLocator.version})`,
      "FORM_NOT_FOUND",
    );
  }

  const usernameSelector = authLocator.any("USERNAME_INPUT");
  const passwordSelector = authLocator.any("PASSWORD_INPUT");
  await driver.fill(usernameSelector, credentials.email);
  await driver.fill(passwordSelector, credentials.password);
  await driver.press(passwordSelector, "Enter");

  const signal = await waitForPostLoginSignal(driver, options.timeoutMs);

  if (signal === "rejected") {
    throw new AuthError("The site rejected the submitted credentials", "LOGIN_REJECTED");
  }
  if (signal === null) {
    throw new AuthError(`No post-login navigation within ${options.timeoutMs}ms`, "TIMEOUT");
  }

  logger.info({ signal, url: driver.currentUrl() }, "Login completed");
}
