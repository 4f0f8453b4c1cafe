export interface EventSeed {
  name: string;
  location: string;
  description: string;
  price: number;
  capacity: number;
  /** Negative for events that already happened. */
  daysFromNow: number;
  imageFileName?: string;
}

export const eventSeedData: EventSeed[] = [
  {
    name: 'BugSmash',
    location: 'Denver, CO',
    description:
      'A fun evening of bug smashing and pizza with fellow developers.',
    price: 0,
    capacity: 75,
    daysFromNow: 30,
    imageFileName: 'bugsmash.png',
  },
  {
    name: 'Hackathon',
    location: 'Austin, TX',
    description:
      'Twenty-four hours of building something new with a team you just met.',
    price: 15,
    capacity: 40,
    daysFromNow: 60,
    imageFileName: 'hackathon.jpg',
  },
  {
    name: 'Kata Camp',
    location: 'Portland, OR',
    description:
      'Practice the basics with code katas and pair programming rotations.',
    price: 75.5,
    capacity: 12,
    daysFromNow: 90,
  },
  {
    name: 'Coffee Code',
    location: 'Boulder, CO',
    description:
      'An informal morning of coffee and open-source contributions together.',
    price: 0,
    capacity: 20,
    daysFromNow: -14,
    imageFileName: 'coffee.gif',
  },
];
