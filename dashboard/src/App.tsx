/**
 * Root application component. The voice page is the whole app.
 */

import { Voice } from "./pages/Voice.js";

// ============================================================================
// COMPONENT
// ============================================================================

export function App() {
  return (
    <main className="app">
      <Voice />
    </main>
  );
}
