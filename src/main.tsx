import React from "react";
import ReactDOM from "react-dom/client";
import App from "./App";
import { configureMonaco } from "./lib/monacoSetup";
import "./index.css";

const ROOT_ELEMENT_ID = "root";

configureMonaco();

const rootElement = document.getElementById(ROOT_ELEMENT_ID);
if (!rootElement) {
  throw new Error(`Missing #${ROOT_ELEMENT_ID} element`);
}

ReactDOM.createRoot(rootElement).render(
  <React.StrictMode>
    <App />
  </React.StrictMode>
);
