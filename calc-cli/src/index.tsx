import React from "react";
import { render } from "ink";
import { devLog, loadCalcConfig } from "@calc/main";
import { App } from "./app/app.js";

const config = loadCalcConfig();
devLog("calc-cli starting", config);

const { waitUntilExit } = render(<App config={config} />);
await waitUntilExit();
