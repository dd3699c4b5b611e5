#!/usr/bin/env node
import { main } from "./index";

await main();
