import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildSlot } from '../src/aggregator.js';
import { DashboardRenderer, MAX_COMPLETED_ON_DASHBOARD, renderDashboard } from '../src/renderer.js';
import { summarize } from '../src/statistics.js';
import type { AggregatedShow, CompletedSeason } from '../src/types.js';
import { NOW, aggregatedShow, episode, testConfig, testContext } from './helpers.js';

const { window } = testContext();
const options = testConfig();

function input(shows: AggregatedShow[], completedSeasons: CompletedSeason[] = []) {
  return { shows, summary: summarize(shows, window), completedSeasons, generatedAt: NOW };
}

function completed(seriesId: number, title: string): CompletedSeason {
  return {
    seriesId,
    title,
    season: 2,
    completionDate: '2026-10-14',
    completionDisplay: 'Oct 14, 2026',
    totalEpisodes: 8,
    posterUrl: '',
  };
}

describe('DashboardRenderer.buildView', () => {
  it('maps shows into display values', () => {
    const show = aggregatedShow({
      rating: 8.44,
      genres: ['Drama', 'Mystery', 'Crime', 'Thriller'],
      slots: [buildSlot('2026-10-19', [episode({ title: 'Pilot' })], NOW)],
      progress: { percentage: 80, currentSeason: 3, currentSeasonProgress: 66.6 },
      windowPercentage: 10,
      episodesInRange: 1,
    });
    const view = new DashboardRenderer(options).buildView(input([show]));
    const [card] = view.shows;

    assert.equal(card.detailUrl, 'http://sonarr.test:8989/series/harbor-lights');
    assert.equal(card.meta, '2024 • Channel 9 • 45 min • ⭐ 8.4');
    assert.equal(card.bucket, 'high');
    assert.equal(card.rangeBucket, 'low');
    assert.equal(card.hasEpisodes, true);
    assert.equal(card.currentSeason, '03');
    assert.equal(card.currentSeasonProgress, '67');
    assert.equal(card.progress, '80.0');
    assert.deepEqual(card.genres, ['Drama', 'Mystery', 'Crime']);
    assert.deepEqual(card.slots, [
      {
        label: 'S01E01',
        formattedDate: 'Mon, Oct 19',
        daysText: 'Today',
        daysClass: 'days-today',
        statusClass: 'status-monitored',
        multi: false,
        text: 'Pilot',
        tooltip: 'Pilot',
      },
    ]);
    assert.equal(view.refreshInterval, '6 hours');
    assert.equal(view.lastUpdated, '2026-10-19 12:00:00 UTC');
  });

  it('sorts the jump menu by title and caps the completed list', () => {
    const shows = [
      aggregatedShow({ seriesId: 2, title: 'Zebra Crossing', truncatedTitle: 'Zebra Crossing' }),
      aggregatedShow({ seriesId: 1, title: 'Apple Orchard', truncatedTitle: 'Apple Orchard' }),
    ];
    const seasons = Array.from({ length: 8 }, (_, i) => completed(i + 1, `Show ${i + 1}`));

    const view = new DashboardRenderer(options).buildView(input(shows, seasons));

    assert.deepEqual(view.jumpMenu, [
      { seriesId: 1, label: 'Apple Orchard' },
      { seriesId: 2, label: 'Zebra Crossing' },
    ]);
    assert.equal(view.completedCount, 8);
    assert.equal(view.completed.length, MAX_COMPLETED_ON_DASHBOARD);
  });
});

describe('renderDashboard', () => {
  it('escapes show text', () => {
    const show = aggregatedShow({ title: 'Tom & Jerry <Live>', truncatedTitle: 'Tom & Jerry <Live>' });

    const html = renderDashboard(input([show]), options);

    assert.ok(
      html.includes('<h3 class="show-title" title="Tom &amp; Jerry &lt;Live&gt;">Tom &amp; Jerry &lt;Live&gt;</h3>')
    );
  });

  it('tags each card with its filter buckets', () => {
    const show = aggregatedShow({
      seriesId: 42,
      progress: { percentage: 100 },
      windowPercentage: 0,
    });

    const html = renderDashboard(input([show]), options);

    assert.ok(
      html.includes(
        '<div id="show-42" class="show-card-wrapper" data-bucket="complete" data-range-bucket="none" data-has-episodes="false">'
      )
    );
    assert.ok(html.includes('<option value="#show-42">Harbor Lights</option>'));
  });

  it('shows a statistics-unavailable state instead of library progress', () => {
    const show = aggregatedShow({
      seriesId: 42,
      progress: { statisticsAvailable: false, status: 'unknown' },
    });

    const html = renderDashboard(input([show]), options);

    assert.ok(
      html.includes(
        '<div id="show-42" class="show-card-wrapper" data-bucket="unknown" data-range-bucket="none" data-has-episodes="false">'
      )
    );
    assert.ok(html.includes('<div class="progress-item statistics-unavailable">Statistics unavailable</div>'));
    assert.equal(html.includes('episodes • Season'), false);
    assert.ok(
      html.includes(
        '<div class="summary-note">1 of 1 shows have no season statistics and are left out of library progress</div>'
      )
    );
  });

  it('renders the empty state with the window dates', () => {
    const html = renderDashboard(input([]), options);

    assert.ok(html.includes('<h3>No Shows with Episodes in Date Range</h3>'));
    assert.ok(html.includes('<p>No shows have episodes scheduled from Oct 12, 2026 to Nov 18, 2026.</p>'));
    assert.ok(html.includes('<div class="no-completed-seasons">No seasons completed in date range</div>'));
  });

  it('applies the theme, grid width and thousands separators', () => {
    const shows = [
      aggregatedShow({ progress: { totalEpisodes: 5000, downloadedEpisodes: 1000 } }),
      aggregatedShow({ seriesId: 11, progress: { totalEpisodes: 678, downloadedEpisodes: 234 } }),
    ];

    const html = renderDashboard(input(shows), testConfig({ htmlTheme: 'light', gridColumns: 6 }));

    assert.ok(html.includes('<body class="theme-light">'));
    assert.ok(html.includes('grid-template-columns: repeat(6, minmax(0, 1fr));'));
    assert.ok(html.includes('1,234/5,678 episodes • 2 series'));
  });
});
