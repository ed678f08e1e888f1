import express, { type Express } from "express";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

const PUBLIC_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "public");

export function serveStatic(app: Express, publicDir = PUBLIC_DIR) {
  if (!fs.existsSync(publicDir)) {
    throw new Error(`Could not find the static directory: ${publicDir}`);
  }

  // index.html doubles as the landing page at "/"
  app.use(express.static(publicDir));
}
