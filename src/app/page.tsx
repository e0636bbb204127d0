"use client";

import { useState } from "react";
import { ShopMusicPlayer } from "@/components/ShopMusicPlayer";
import { shopTracks } from "@/data/shopTracks";

type Tab = "shop" | "rotation";

const TAB_LABELS: Record<Tab, string> = {
  shop: "Shop",
  rotation: "Now in rotation",
};

export default function Home() {
  const [activeTab, setActiveTab] = useState<Tab>("shop");

  return (
    <main className="page-shell">
      <ShopMusicPlayer />

      <header className="hero">
        <p className="hero-chip">The Shop</p>
        <h1>Browse the shelves, the soundtrack is on us</h1>
        <p className="hero-sub">
          Music starts as soon as the shop opens and keeps playing while you
          move between tabs. Skip, go back or pause from the player dock.
        </p>
      </header>

      <nav className="tab-nav" aria-label="Page tabs">
        {(Object.keys(TAB_LABELS) as Tab[]).map((tab) => (
          <button
            key={tab}
            type="button"
            onClick={() => setActiveTab(tab)}
            className={`tab-btn ${activeTab === tab ? "active" : ""}`}
          >
            {TAB_LABELS[tab]}
          </button>
        ))}
      </nav>

      <section className="panel">
        {activeTab === "shop" ? (
          <article className="soft-card">
            <h2>Welcome in</h2>
            <p>
              The player dock stays open on every tab. Tracks play in order and
              the next one starts by itself when the current one ends.
            </p>
          </article>
        ) : null}

        {activeTab === "rotation" ? (
          <article className="soft-card">
            <h2>Playlist</h2>
            <ol className="rotation-list">
              {shopTracks.map((track) => (
                <li key={track.id}>{track.name}</li>
              ))}
            </ol>
          </article>
        ) : null}
      </section>
    </main>
  );
}
