#!/usr/bin/env -S node --import tsx
import { cli } from "./cli.ts";

await cli.parseAsync();
