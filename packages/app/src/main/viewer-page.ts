/**
 * @module viewer-page
 * HTML served as the viewer window.
 *
 * The page has no state of its own: it reports its drawable size in physical
 * pixels, forwards Escape as a quit request, and swaps in each new frame the
 * server announces over `/events`.
 */

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const PAGE_SCRIPT = `
(() => {
  const frame = document.getElementById('frame');
  let reported = { width: 0, height: 0 };
  let closed = false;

  function post(path, body) {
    return fetch(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    }).catch(() => undefined);
  }

  function reportSize() {
    const dpr = window.devicePixelRatio || 1;
    const width = Math.max(1, Math.round(window.innerWidth * dpr));
    const height = Math.max(1, Math.round(window.innerHeight * dpr));
    if (closed || (width === reported.width && height === reported.height)) return;
    reported = { width, height };
    post('/api/resize', reported);
  }

  window.addEventListener('resize', reportSize);
  window.addEventListener('keydown', (event) => {
    if (event.key === 'Escape') post('/api/quit', {});
  });

  const events = new EventSource('/events');
  events.addEventListener('frame', (event) => {
    const info = JSON.parse(event.data);
    const dpr = window.devicePixelRatio || 1;
    frame.style.width = info.width / dpr + 'px';
    frame.style.height = info.height / dpr + 'px';
    frame.src = '/frame.png?r=' + info.revision;
  });
  events.addEventListener('quit', () => {
    closed = true;
    events.close();
    document.body.classList.add('closed');
    window.close();
  });

  reportSize();
})();
`;

/** Render the viewer page with the given window title. */
export function renderViewerPage(title: string): string {
  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
<style>
  html, body { margin: 0; height: 100%; overflow: hidden; background: #ffffff; }
  #frame { position: fixed; top: 0; left: 0; display: block; }
  body.closed #frame { display: none; }
</style>
</head>
<body>
<img id="frame" alt="">
<script>${PAGE_SCRIPT}</script>
</body>
</html>
`;
}
