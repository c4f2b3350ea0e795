import { html } from 'hono/html';

export type Html = ReturnType<typeof html>;

export interface PageOptions {
  title: string;
  /** controller:action identifier read by the front end */
  page: string;
  flash?: string;
  projectPath?: string;
}

/**
 * Render a fragment to the string sent in JSON responses
 */
export async function renderToString(fragment: Html): Promise<string> {
  return (await fragment).toString();
}

export function layout(options: PageOptions, content: Html): Html {
  return html`<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${options.title}${options.projectPath ? ` · ${options.projectPath}` : ''}</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 0; color: #24292f; }
    .content { max-width: 1200px; margin: 0 auto; padding: 16px; }
    .flash-notice { background: #ddf4ff; border: 1px solid #54aeff; padding: 8px 16px; margin-bottom: 16px; }
    .diff-file { border: 1px solid #d0d7de; border-radius: 6px; margin-bottom: 16px; }
    .file-title { background: #f6f8fa; padding: 8px; font-family: monospace; }
    table.code { width: 100%; border-collapse: collapse; font-family: monospace; font-size: 12px; }
    .diff-line-num { width: 40px; text-align: right; color: #6e7781; padding: 0 8px; }
    .line_content { white-space: pre; }
    .line_content.new, .new .line_content { background: #e6ffec; }
    .line_content.old, .old .line_content { background: #ffebe9; }
    .line_content.match { color: #6e7781; background: #f6f8fa; }
    .form-errors { color: #cf222e; }
  </style>
</head>
<body data-page="${options.page}">
  <div class="content">
    ${options.flash ? html`<div class="flash-notice">${options.flash}</div>` : ''}
    ${content}
  </div>
</body>
</html>`;
}
