export const houseTemplate = `# A small house drawn with the pen

# Walls and door
set color brown
draw rectangle 300 300 200 150
draw rectangle 380 370 40 80

# Roof, traced with the pen
set color red
pen up
move 290 300
pen down
move 400 200
move 510 300
move 290 300

# Sun
pen up
set color yellow
draw circle 650 120 40
`;
