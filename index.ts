// FILE: index.ts
import { render } from "lit-html";

import { RecordsView } from "./components/pages/records-page";
import {
  configProviderFromEnv,
  setupGlobalErrorLogger,
} from "./lib/client/runtime";

// Vite exposes only VITE_-prefixed variables to the browser.
const configProvider = configProviderFromEnv(import.meta.env);

setupGlobalErrorLogger(window, configProvider);

const root = document.getElementById("app");
if (root) {
  const view = RecordsView(configProvider);
  render(view.template, root);
  window.addEventListener("beforeunload", () => view.cleanup?.());
}
