/**
 * =============================================================================
 * NAVIGATOR VIEW - Server-rendered page
 * =============================================================================
 *
 * One page: the request form, then (after a successful POST) the map, the
 * annotated steps and the advisory. Every user- or upstream-supplied string
 * goes through escapeHtml; the map data goes through serializeForScript and
 * is drawn by /static/map.js.
 * =============================================================================
 */

import { DISASTER_TYPES, EMERGENCY_CONTACTS } from '../../core/constants';
import {
  escapeHtml,
  formatDistanceKm,
  formatDurationMinutes,
  serializeForScript,
} from '../../shared/utils/format.utils';
import { RouteStep } from '../routing/routing.schema';
import { EvacuationPlanView } from './navigator.schema';

const LEAFLET_VERSION = '1.9.4';

export const SUCCESS_BANNER = 'Emergency plan generated successfully!';

/** Form fields echoed back exactly as submitted */
export interface PageForm {
  description: string;
  disasterType: string;
  latitude: string;
  longitude: string;
}

export interface PageState {
  form: PageForm;
  error?: string;
  plan?: EvacuationPlanView;
}

/**
 * Payload read by public/map.js
 */
export interface MapData {
  origin: [number, number];
  destination: { latitude: number; longitude: number; name: string };
  path: Array<[number, number]>;
}

export function toMapData(plan: EvacuationPlanView): MapData {
  return {
    origin: [plan.origin.latitude, plan.origin.longitude],
    destination: {
      latitude: plan.destination.latitude,
      longitude: plan.destination.longitude,
      name: plan.destination.name,
    },
    path: plan.path,
  };
}

function renderDisasterOptions(selected: string): string {
  return DISASTER_TYPES
    .map(type => `<option value="${type}"${type === selected ? ' selected' : ''}>${type}</option>`)
    .join('\n          ');
}

function renderForm(form: PageForm): string {
  return `
    <form method="post" action="/" class="panel">
      <label for="description">Describe your emergency</label>
      <textarea id="description" name="description" rows="4" placeholder="e.g. Water is rising in the street and we need to leave">${escapeHtml(form.description)}</textarea>

      <label for="disasterType">Disaster type</label>
      <select id="disasterType" name="disasterType">
          ${renderDisasterOptions(form.disasterType)}
      </select>

      <div class="coords">
        <label>Latitude <input type="text" name="latitude" value="${escapeHtml(form.latitude)}"></label>
        <label>Longitude <input type="text" name="longitude" value="${escapeHtml(form.longitude)}"></label>
      </div>

      <button type="submit">🚨 Get Evacuation Plan</button>
    </form>`;
}

export function renderStep(step: RouteStep, index: number): string {
  const status = step.blocked
    ? `<span class="status">🚧 Blockage Detected: ${escapeHtml(step.roadName)} ➡️ ${escapeHtml(step.alternative ?? '')}</span>`
    : '<span class="status">✅ Clear Path</span>';

  return `
        <li class="step ${step.blocked ? 'blocked' : 'clear'}">
          <strong>Step ${index + 1}:</strong> ${escapeHtml(step.instruction)}
          <span class="metrics">📏 ${formatDistanceKm(step.distanceMeters)} · ⏱️ ${formatDurationMinutes(step.durationSeconds)}</span>
          ${status}
        </li>`;
}

function renderPlan(plan: EvacuationPlanView): string {
  return `
    <div class="banner success">${SUCCESS_BANNER}</div>

    <section class="panel">
      <h2>🗺️ Route to ${escapeHtml(plan.destination.name)}</h2>
      <p class="totals">Total: ${formatDistanceKm(plan.route.totalDistanceMeters)} · ${formatDurationMinutes(plan.route.totalDurationSeconds)}</p>
      <div id="map"></div>
      <script type="application/json" id="route-data">${serializeForScript(toMapData(plan))}</script>
    </section>

    <section class="panel">
      <h2>🧭 Step-by-step directions</h2>
      <ol class="steps">${plan.route.steps.map(renderStep).join('')}
      </ol>
    </section>

    <section class="panel">
      <h2>🛡️ Safety advisory</h2>
      <div class="advisory">${escapeHtml(plan.advisory)}</div>
    </section>`;
}

function renderContacts(): string {
  const items = EMERGENCY_CONTACTS
    .map(contact => `<li>${contact.icon} ${contact.label}: <strong>${contact.number}</strong></li>`)
    .join('\n        ');

  return `
    <footer class="panel contacts">
      <h2>Emergency contacts</h2>
      <ul>
        ${items}
      </ul>
    </footer>`;
}

/**
 * Full HTML document. An error always replaces the results.
 */
export function renderPage(state: PageState): string {
  const error = state.error
    ? `\n    <div class="banner error">⚠️ ${escapeHtml(state.error)}</div>`
    : '';
  const results = !state.error && state.plan ? renderPlan(state.plan) : '';
  const mapAssets = results
    ? `
  <script src="https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.js"></script>
  <script src="/static/map.js"></script>`
    : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>Emergency Evacuation Navigator</title>
  <link rel="stylesheet" href="https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.css">
  <link rel="stylesheet" href="/static/styles.css">
</head>
<body>
  <main>
    <h1>🆘 Emergency Evacuation Navigator</h1>${error}
    ${renderForm(state.form)}
    ${results}
    ${renderContacts()}
  </main>${mapAssets}
</body>
</html>
`;
}
