import { Game } from "./types";

/** Example catalog inserted by the seed endpoint when the collection is empty. Order is insertion order. */
export const SAMPLE_GAMES: readonly Game[] = [
  {
    title: "Starlight Odyssey",
    description: "Explore a vast galaxy in this open-world space adventure.",
    genre: "Adventure",
    platform: "PC",
    size_gb: 12.5,
    thumbnail: "https://images.unsplash.com/photo-1586125674857-4c4a1b3e72d0",
    screenshots: [
      "https://images.unsplash.com/photo-1542751110-97427bbecf20",
      "https://images.unsplash.com/photo-1542831371-29b0f74f9713"
    ],
    download_url: "https://example.com/download/starlight-odyssey"
  },
  {
    title: "Neon Drift",
    description: "High-speed neon-soaked racing in a cyberpunk city.",
    genre: "Racing",
    platform: "PC",
    size_gb: 8.2,
    thumbnail: "https://images.unsplash.com/photo-1511512578047-dfb367046420",
    screenshots: [
      "https://images.unsplash.com/photo-1535223289827-42f1e9919769",
      "https://images.unsplash.com/photo-1483721310020-03333e577078"
    ],
    download_url: "https://example.com/download/neon-drift"
  },
  {
    title: "Echoes of Eldoria",
    description: "A story-driven RPG with tactical combat and rich lore.",
    genre: "RPG",
    platform: "PC",
    size_gb: 25,
    thumbnail: "https://images.unsplash.com/photo-1520975922371-24b89f8378fd",
    screenshots: ["https://images.unsplash.com/photo-1486406146926-c627a92ad1ab"],
    download_url: "https://example.com/download/echoes-of-eldoria"
  }
];
